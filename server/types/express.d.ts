import 'express';

declare global {
  namespace Express {
    /** Body of POST /api/documents/check after validation */
    interface ValidatedCheckBody {
      content: string;
      id?: string;
    }

    interface Request {
      /** Set by validation middleware(s) after Zod-based normalization */
      validated?: {
        body?: ValidatedCheckBody;
      };
    }
  }
}

export {}; // ensure this file is treated as a module
