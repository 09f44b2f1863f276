import mongoose, { Schema, Document, Model } from 'mongoose';

export interface IUser extends Document {
  email: string;
  name: string;
  password: string;        // bcrypt digest
  bio: string;
  isAdmin: boolean;
  badge?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    email: { type: String, required: true, unique: true, index: true, lowercase: true, trim: true },
    name: { type: String, required: true },
    password: { type: String, required: true },
    bio: { type: String, default: '' },
    isAdmin: { type: Boolean, default: false, index: true },
    badge: { type: String, default: null },
  },
  { timestamps: true }
);

export const User: Model<IUser> = mongoose.model<IUser>('User', UserSchema);
