import type { Identity } from "../modules/auth/auth.types.js";

declare global {
  namespace Express {
    interface Request {
      auth?: Identity;
    }
  }
}

export {};
