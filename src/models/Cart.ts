import mongoose, { Document, Schema, Types } from 'mongoose';

// One cart per customer, enforced by the unique index on `customer`.
// Carts that predate the index are folded together by utils/mergeCarts.ts.
// Items live in their own collection (see CartItem.ts).

export interface ICart extends Document<Types.ObjectId> {
  customer: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

const CartSchema = new Schema<ICart>(
  {
    customer: {
      type: Schema.Types.ObjectId,
      ref: 'Customer',
      required: true,
      unique: true
    }
  },
  {
    timestamps: true
  }
);

export default mongoose.model<ICart>('Cart', CartSchema);
