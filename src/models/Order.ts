import mongoose, { Document, Schema, Types } from 'mongoose';
import { ORDER_STATUSES, type OrderStatus } from '../types';

// An order is a snapshot of a completed checkout. Only `status` changes
// after creation. `customer` is nulled (not cascaded) when the customer
// deletes their account so order history survives.

export interface IOrder extends Document<Types.ObjectId> {
  customer: Types.ObjectId | null;
  orderTime: Date;
  status: OrderStatus;
  price: number;
  createdAt: Date;
  updatedAt: Date;
}

const OrderSchema = new Schema<IOrder>(
  {
    customer: {
      type: Schema.Types.ObjectId,
      ref: 'Customer',
      default: null
    },
    orderTime: {
      type: Date,
      required: true,
      default: Date.now
    },
    status: {
      type: String,
      enum: ORDER_STATUSES,
      default: 'Pending'
    },
    price: {
      type: Number,
      required: true,
      min: 0
    }
  },
  {
    timestamps: true
  }
);

// Indexes
OrderSchema.index({ customer: 1, orderTime: -1 });
OrderSchema.index({ orderTime: -1, status: 1 });

export default mongoose.model<IOrder>('Order', OrderSchema);
