// src/types/express.d.ts

declare global {
    namespace Express {
        interface Request {
            /** Unparsed request body, read by the webhook route for HMAC checks */
            rawBody?: Buffer;
        }
    }
}

export {};
