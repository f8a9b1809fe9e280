/**
 * Input validation utilities.
 */

import { z } from "zod";

/** Ticker symbols are passed through as given; format is not checked */
const TickerSchema = z.string({ invalid_type_error: "Each ticker must be a string" });

/** Body of POST /api/stock-data */
export const StockDataRequestSchema = z.object({
  tickers: z.array(TickerSchema, {
    required_error: "Request body must include a 'tickers' list",
    invalid_type_error: "'tickers' must be a list of ticker symbols",
  }),
});

/** Flatten zod issues into one readable line */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
