import mongoose, { Schema, Document, Model } from 'mongoose';

export interface IReview extends Document {
  ideaId: mongoose.Types.ObjectId;
  reviewerId: mongoose.Types.ObjectId | null;
  rating: number;
  comment: string;
  createdAt: Date;
  updatedAt: Date;
}

const ReviewSchema = new Schema<IReview>(
  {
    ideaId: { type: Schema.Types.ObjectId, ref: 'Idea', required: true, index: true },
    reviewerId: { type: Schema.Types.ObjectId, ref: 'User', default: null, index: true },
    rating: { type: Number, required: true, min: 1, max: 5 },
    comment: { type: String, default: '' },
  },
  { timestamps: true }
);

// no unique (ideaId, reviewerId): one user may review the same idea more than once
ReviewSchema.index({ ideaId: 1, createdAt: 1 });

export const Review: Model<IReview> = mongoose.model<IReview>('Review', ReviewSchema);
