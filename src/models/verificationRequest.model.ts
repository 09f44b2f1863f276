import mongoose, { Schema, Document, Model } from 'mongoose';
import { VERIFICATION_STATUSES, type VerificationStatus } from '../domain/types';

export interface IVerificationRequest extends Document {
  requesterId: mongoose.Types.ObjectId;
  claim: string;
  details: string;
  proofs: string[];
  status: VerificationStatus;
  adminNote?: string | null;
  reviewerId?: mongoose.Types.ObjectId | null;
  reviewedAt?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const VerificationRequestSchema = new Schema<IVerificationRequest>(
  {
    requesterId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
    claim: { type: String, required: true },
    details: { type: String, default: '' },
    proofs: [{ type: String }],
    status: { type: String, enum: [...VERIFICATION_STATUSES], default: 'pending' },
    adminNote: { type: String, default: null },
    reviewerId: { type: Schema.Types.ObjectId, ref: 'User', default: null },
    reviewedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

VerificationRequestSchema.index({ status: 1, createdAt: 1 });

export const VerificationRequest: Model<IVerificationRequest> = mongoose.model<IVerificationRequest>(
  'VerificationRequest',
  VerificationRequestSchema
);
