import mongoose, { Schema } from 'mongoose';
import { USER_ROLES } from '../schemas/entity.schemas';

const ProfileSchema = new Schema(
  {
    bio: { type: String },
    avatar: { type: String },
    skills: { type: [String], default: undefined },
  },
  { _id: false }
);

export const UserSchema = new Schema(
  {
    userId: { type: String, required: true },
    email: { type: String, required: true, lowercase: true, trim: true },
    firstName: { type: String, required: true },
    lastName: { type: String, required: true },
    role: { type: String, enum: USER_ROLES, required: true },
    dateJoined: { type: Date },
    profile: { type: ProfileSchema },
    isActive: { type: Boolean, default: true },
  },
  {
    collection: 'users',
    versionKey: false,
    autoIndex: false,
  }
);

UserSchema.index({ userId: 1 }, { unique: true });
UserSchema.index({ email: 1 }, { unique: true });
UserSchema.index({ role: 1 });

/**
 * Server-side validator installed when the collection is created.
 */
export const userJsonSchema = {
  $jsonSchema: {
    bsonType: 'object',
    required: ['userId', 'email', 'firstName', 'lastName', 'role'],
    properties: {
      userId: { bsonType: 'string' },
      email: {
        bsonType: 'string',
        pattern: '^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$',
      },
      firstName: { bsonType: 'string' },
      lastName: { bsonType: 'string' },
      role: { enum: [...USER_ROLES] },
    },
  },
};

// Guard against OverwriteModelError when the module is evaluated twice
export const UserModel = mongoose.models.User || mongoose.model('User', UserSchema);
