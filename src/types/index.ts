/**
 * Central type definitions for the environment resolver
 *
 * This barrel file exports all types for convenient importing:
 * import { EnvironmentDescriptor, ValidationError } from '../types';
 */

// Process configuration types
export * from "./environment";

// Descriptor shapes
export * from "./descriptor";

// Result values
export * from "./result";

// Error handling types
export * from "./errors";
