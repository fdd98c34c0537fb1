/**
 * Error handling type definitions
 */

export * from "./error.types";
