/**
 * Request body schemas for the validate-body middleware.
 */

/** 'scalar' accepts a string or a number. */
export type FieldType = 'string' | 'number' | 'scalar' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  /** Only whole numbers. */
  integer?: boolean;
  enum?: readonly string[];
}

export type BodySchema = Record<string, FieldSchema>;
