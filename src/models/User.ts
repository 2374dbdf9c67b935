import { Schema, model, Document, Types } from "mongoose";

export interface UserDoc extends Document<Types.ObjectId> {
  name: string;
  email?: string | null;
  phone?: string | null;
  passwordHash: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<UserDoc>(
  {
    name: { type: String, required: true, trim: true },
    // sparse: several users may have no email at all
    email: { type: String, unique: true, sparse: true, trim: true, lowercase: true },
    phone: { type: String, trim: true },
    passwordHash: { type: String, required: true },
    active: { type: Boolean, default: true },
  },
  { timestamps: true }
);

export default model<UserDoc>("User", UserSchema);
