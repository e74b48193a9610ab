import rateLimit from "express-rate-limit";
import { config } from "@/shared/config/environment";
import type { ApiResponse } from "@/shared/types/common.types";

// General rate limiting
export const generalRateLimit = rateLimit({
  windowMs: config.rateLimit.windowMs,
  max: config.rateLimit.maxRequests,
  message: {
    success: false,
    message: "Too many requests, please try again later",
    code: "RATE_LIMIT_EXCEEDED",
  } satisfies ApiResponse,
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req) => config.app.isTest || req.path.startsWith("/health"),
});

// Resource creation rate limiting
export const createResourceRateLimit = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 10, // 10 creations per minute
  message: {
    success: false,
    message: "Too many creation requests, please slow down",
    code: "CREATE_RATE_LIMIT_EXCEEDED",
  } satisfies ApiResponse,
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => config.app.isTest,
});
