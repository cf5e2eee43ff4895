import mongoose, { Document, Schema, Types } from 'mongoose';
import {
  PAYMENT_MODES,
  PAYMENT_STATUSES,
  type PaymentMode,
  type PaymentStatus
} from '../types';

// An order may collect several payments over time; the newest by
// paymentTime is the one shown as the order's payment state.

export interface IPayment extends Document<Types.ObjectId> {
  order: Types.ObjectId;
  mode: PaymentMode;
  status: PaymentStatus;
  paymentTime: Date;
}

const PaymentSchema = new Schema<IPayment>(
  {
    order: {
      type: Schema.Types.ObjectId,
      ref: 'Order',
      required: true
    },
    mode: {
      type: String,
      enum: PAYMENT_MODES,
      required: true
    },
    status: {
      type: String,
      enum: PAYMENT_STATUSES,
      default: 'Pending'
    },
    paymentTime: {
      type: Date,
      required: true,
      default: Date.now
    }
  },
  {
    timestamps: true
  }
);

PaymentSchema.index({ order: 1, paymentTime: -1 });
PaymentSchema.index({ paymentTime: -1 });

export default mongoose.model<IPayment>('Payment', PaymentSchema);
