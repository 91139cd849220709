/**
 * kova - composable validation for TypeScript
 *
 * Validators are plain values combined with `and`, `or`, `then` and `map`.
 * Failures are collected as path-qualified messages whose text is resolved
 * from locale bundles when read.
 *
 * @packageDocumentation
 */

export * from './core';
