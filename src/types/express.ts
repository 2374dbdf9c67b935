import { UserRecord } from "./auth";

declare global {
  namespace Express {
    interface Request {
      user?: UserRecord;
    }
  }
}

// Ensure this file is treated as a module
export {};
