/**
 * Validates function call arguments against their declared JSON Schema.
 * Enforces types, required fields and max string lengths so oversized or
 * mistyped model output never reaches a network API.
 */

const DEFAULT_MAX_STRING_LENGTH = 10_000;

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
  sanitizedInput?: Record<string, unknown>;
}

export interface SchemaProperty {
  type?: "string" | "number" | "integer" | "boolean" | "array" | "object";
  enum?: Array<string | number>;
  items?: SchemaProperty;
  description?: string;
  minimum?: number;
  maximum?: number;
  minItems?: number;
  maxItems?: number;
  maxLength?: number;
}

export interface InputSchema {
  type: "object";
  properties: Record<string, SchemaProperty>;
  required?: string[];
}

export class ToolInputValidator {
  static validate(schema: InputSchema, input: Record<string, unknown>): ValidationResult {
    const errors: string[] = [];
    const sanitized: Record<string, unknown> = {};

    for (const key of schema.required ?? []) {
      if (input[key] === undefined || input[key] === null) {
        errors.push(`Missing required field: ${key}`);
      }
    }

    for (const [key, value] of Object.entries(input)) {
      const property = schema.properties[key];
      if (!property) {
        // Undeclared fields never reach the function
        continue;
      }

      const fieldErrors = this.validateField(key, value, property);
      if (fieldErrors.length > 0) {
        errors.push(...fieldErrors);
      } else {
        sanitized[key] = value;
      }
    }

    if (errors.length > 0) {
      return { valid: false, errors };
    }
    return { valid: true, sanitizedInput: sanitized };
  }

  private static validateField(key: string, value: unknown, schema: SchemaProperty): string[] {
    const errors: string[] = [];
    if (value === undefined || value === null) return errors;

    switch (schema.type) {
      case "string": {
        if (typeof value !== "string") {
          errors.push(`Field "${key}" must be a string, got ${typeof value}`);
          break;
        }
        const maxLen = schema.maxLength ?? DEFAULT_MAX_STRING_LENGTH;
        if (value.length > maxLen) {
          errors.push(`Field "${key}" exceeds maximum length (${value.length} > ${maxLen})`);
        }
        if (schema.enum && !schema.enum.includes(value)) {
          errors.push(`Field "${key}" must be one of: ${schema.enum.join(", ")}`);
        }
        break;
      }

      case "number":
      case "integer": {
        if (typeof value !== "number" || Number.isNaN(value)) {
          errors.push(`Field "${key}" must be a number, got ${typeof value}`);
          break;
        }
        if (schema.type === "integer" && !Number.isInteger(value)) {
          errors.push(`Field "${key}" must be an integer`);
        }
        if (schema.minimum !== undefined && value < schema.minimum) {
          errors.push(`Field "${key}" must be >= ${schema.minimum}`);
        }
        if (schema.maximum !== undefined && value > schema.maximum) {
          errors.push(`Field "${key}" must be <= ${schema.maximum}`);
        }
        if (schema.enum && !schema.enum.includes(value)) {
          errors.push(`Field "${key}" must be one of: ${schema.enum.join(", ")}`);
        }
        break;
      }

      case "boolean":
        if (typeof value !== "boolean") {
          errors.push(`Field "${key}" must be a boolean, got ${typeof value}`);
        }
        break;

      case "array": {
        if (!Array.isArray(value)) {
          errors.push(`Field "${key}" must be an array, got ${typeof value}`);
          break;
        }
        if (schema.minItems !== undefined && value.length < schema.minItems) {
          errors.push(`Field "${key}" must have at least ${schema.minItems} items`);
        }
        if (schema.maxItems !== undefined && value.length > schema.maxItems) {
          errors.push(`Field "${key}" must have at most ${schema.maxItems} items`);
        }
        const items = schema.items;
        if (items?.type) {
          value.forEach((item: unknown, i) => {
            errors.push(...this.validateField(`${key}[${i}]`, item, items));
          });
        }
        break;
      }

      case "object":
        if (typeof value !== "object" || Array.isArray(value)) {
          errors.push(`Field "${key}" must be an object, got ${typeof value}`);
        }
        break;
    }

    return errors;
  }
}
