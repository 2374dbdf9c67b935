import { Schema, model, Document, Types } from "mongoose";
import { TokenType } from "../types/auth";

export interface OpaqueTokenDoc extends Document<Types.ObjectId> {
  userId: Types.ObjectId;
  token: string;
  tokenType: TokenType;
  expiresAt: Date;
  isRevoked: boolean;
  createdAt: Date;
  lastUsedAt?: Date | null;
}

const schema = new Schema<OpaqueTokenDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    token: { type: String, required: true, unique: true },
    tokenType: { type: String, enum: ["access", "refresh"], required: true, default: "access" },
    expiresAt: { type: Date, required: true, index: true },
    isRevoked: { type: Boolean, default: false },
    lastUsedAt: { type: Date, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export default model<OpaqueTokenDoc>("OpaqueToken", schema);
