import mongoose, { Document, Schema, Types } from 'mongoose';

// Customer accounts. The owner is not stored here: owner credentials
// come from configuration (see config/env.ts).

export interface ICustomer extends Document<Types.ObjectId> {
  name: string;
  email: string;
  mobile: string;
  password: string;
  createdAt: Date;
  updatedAt: Date;
}

const CustomerSchema = new Schema<ICustomer>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 100
    },
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
      maxlength: 100
    },
    mobile: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      match: /^\d{10}$/
    },
    password: {
      type: String,
      required: true
    }
  },
  {
    timestamps: true
  }
);

export default mongoose.model<ICustomer>('Customer', CustomerSchema);
