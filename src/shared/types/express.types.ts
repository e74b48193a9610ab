// Request fields populated by the application middleware
declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export {};
