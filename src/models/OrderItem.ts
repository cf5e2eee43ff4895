import mongoose, { Document, Schema, Types } from 'mongoose';

// Permanent line of an order. No per-line price is kept: the order's
// `price` is the only stored total. `snackName` is kept for display after
// the snack itself is deleted.

export interface IOrderItem extends Document<Types.ObjectId> {
  order: Types.ObjectId;
  snack: Types.ObjectId;
  snackName: string;
  quantity: number;
}

const OrderItemSchema = new Schema<IOrderItem>({
  order: {
    type: Schema.Types.ObjectId,
    ref: 'Order',
    required: true
  },
  snack: {
    type: Schema.Types.ObjectId,
    ref: 'Snack',
    required: true
  },
  snackName: {
    type: String,
    required: true
  },
  quantity: {
    type: Number,
    required: true,
    min: 1
  }
});

OrderItemSchema.index({ order: 1 });

export default mongoose.model<IOrderItem>('OrderItem', OrderItemSchema);
