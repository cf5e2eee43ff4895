import mongoose, { Document, Schema, Types } from 'mongoose';

export interface ICartItem extends Document<Types.ObjectId> {
  cart: Types.ObjectId;
  snack: Types.ObjectId;
  quantity: number;
}

const CartItemSchema = new Schema<ICartItem>(
  {
    cart: {
      type: Schema.Types.ObjectId,
      ref: 'Cart',
      required: true
    },
    snack: {
      type: Schema.Types.ObjectId,
      // No cascade: a deleted snack leaves the line behind and checkout
      // reports it as an integrity failure
      ref: 'Snack',
      required: true
    },
    quantity: {
      type: Number,
      required: true,
      min: 1,
      default: 1
    }
  },
  {
    timestamps: true
  }
);

// (cart, snack) pairs are unique; addItem upserts against this index
CartItemSchema.index({ cart: 1, snack: 1 }, { unique: true });

export default mongoose.model<ICartItem>('CartItem', CartItemSchema);
