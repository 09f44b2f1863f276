import mongoose, { Schema, Document, Model } from 'mongoose';

export interface IIdea extends Document {
  title: string;
  description: string;
  tags: string;
  authorId: mongoose.Types.ObjectId | null;
  attachments: string[];
  priority: boolean;
  avgRating: number;
  upvotes: number;
  createdAt: Date;
  updatedAt: Date;
}

const IdeaSchema = new Schema<IIdea>(
  {
    title: { type: String, required: true, maxlength: 200 },
    description: { type: String, required: true },
    tags: { type: String, default: '' },
    // null once the author account is deleted
    authorId: { type: Schema.Types.ObjectId, ref: 'User', default: null, index: true },
    attachments: [{ type: String }],
    priority: { type: Boolean, default: false },
    avgRating: { type: Number, default: 0 },
    upvotes: { type: Number, default: 0, min: 0 },
  },
  { timestamps: true }
);

IdeaSchema.index({ createdAt: 1 });

export const Idea: Model<IIdea> = mongoose.model<IIdea>('Idea', IdeaSchema);
