/**
 * Testing utilities for fanout
 */

export * from "./helpers.js";
