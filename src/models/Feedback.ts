import mongoose, { Document, Schema, Types } from 'mongoose';

export interface IFeedback extends Document<Types.ObjectId> {
  customer: Types.ObjectId;
  rating: number | null;
  content: string;
  feedbackTime: Date;
}

const FeedbackSchema = new Schema<IFeedback>(
  {
    customer: {
      type: Schema.Types.ObjectId,
      ref: 'Customer',
      required: true
    },
    rating: {
      type: Number,
      min: 1,
      max: 5,
      default: null
    },
    // Length is capped by FEEDBACK_MAX_LENGTH in the feedback service
    content: {
      type: String,
      default: '',
      trim: true
    },
    feedbackTime: {
      type: Date,
      required: true,
      default: Date.now
    }
  },
  {
    timestamps: true
  }
);

FeedbackSchema.index({ feedbackTime: -1 });

export default mongoose.model<IFeedback>('Feedback', FeedbackSchema);
