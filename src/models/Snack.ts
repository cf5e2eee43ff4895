import mongoose, { Document, Schema, Types } from "mongoose";

// Catalog item. `stock` is only enforced when `stockTracked` is true;
// see services/stock.ts for how a tracked stock of 0 is read.

export interface ISnack extends Document<Types.ObjectId> {
  name: string;
  price: number;
  stock: number;
  stockTracked: boolean;
  image?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const SnackSchema = new Schema<ISnack>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 150,
    },
    price: {
      type: Number,
      required: true,
      min: 0,
    },
    stock: {
      type: Number,
      required: true,
      min: 0,
      default: 0,
    },
    stockTracked: {
      type: Boolean,
      default: true,
    },
    image: {
      type: String,
      default: null,
      trim: true,
    },
  },
  {
    timestamps: true,
  }
);

SnackSchema.index({ createdAt: 1 });

export default mongoose.model<ISnack>("Snack", SnackSchema);
