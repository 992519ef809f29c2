/**
 * Core module exports
 */

export * from "./reconcile";
