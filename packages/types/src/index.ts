/**
 * @fileoverview Shared schemas and validation utilities for mintkit.
 */

export * from './scaffold'
export * from './validation'
