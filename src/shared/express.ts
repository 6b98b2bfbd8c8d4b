/**
 * Express Request Augmentation
 * Layer: Shared (type declarations, imported for its side effect)
 *
 * requestTimer stamps requestStartTime on every request; controllers read it
 * to report meta.totalTimeMs.
 */
declare global {
  namespace Express {
    interface Request {
      requestStartTime?: number;
    }
  }
}

export {};
