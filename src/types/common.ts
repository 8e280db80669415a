/**
 * Shared declarative shapes used across layers.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

/** Top-level field rule checked by the validate-body middleware. */
export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  maxLength?: number;
  minLength?: number;
  /** Strings only. */
  enum?: readonly string[];
  /** Numbers only. */
  min?: number;
  max?: number;
  /** Arrays only. */
  minItems?: number;
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;
