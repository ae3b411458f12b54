/**
 * @lookaround/option - value-or-unavailable results
 */

export * from "./option.mjs";
