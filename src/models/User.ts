import { Document, Schema, model } from 'mongoose';

export const USER_TIERS = ['free', 'pro', 'enterprise'] as const;

export type UserTier = (typeof USER_TIERS)[number];

export interface UserDocument extends Document {
  username?: string;
  email: string;
  name?: string;
  passwordHash: string;
  tier: UserTier;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<UserDocument>(
  {
    username: {
      type: String,
      trim: true,
      lowercase: true,
      minlength: 3,
      maxlength: 24,
    },
    email: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      lowercase: true,
    },
    name: {
      type: String,
      trim: true,
      default: '',
    },
    passwordHash: {
      type: String,
      required: true,
    },
    tier: {
      type: String,
      enum: [...USER_TIERS],
      default: 'free',
    },
  },
  {
    timestamps: true,
  }
);

userSchema.index({ username: 1 }, { unique: true, sparse: true });

export const User = model<UserDocument>('User', userSchema);
