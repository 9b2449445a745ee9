import 'express';

// Imported for its side effect by every module that reads `req.requestId`.
declare module 'express-serve-static-core' {
  interface Request {
    requestId?: string;
  }
}
