/**
 * Schema Validator - structural checks for untyped payloads
 *
 * Model output and config files arrive as `unknown`; nothing is admitted into
 * the typed model until it passes a registered schema.
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type SchemaType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean';

export interface JsonSchema {
    type: SchemaType;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: readonly (string | number | boolean)[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minItems?: number;
    minLength?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        const actualType = this.getType(value);
        const typeMatches = schema.type === actualType
            || (schema.type === 'number' && actualType === 'integer');
        if (!typeMatches) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
            });
            return;
        }

        if (schema.type === 'object' && isRecord(value)) {
            for (const req of schema.required ?? []) {
                if (!(req in value)) {
                    errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                }
            }

            for (const [key, propSchema] of Object.entries(schema.properties ?? {})) {
                if (key in value && value[key] !== undefined) {
                    this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                }
            }
        }

        if (schema.type === 'array' && Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} items, got ${value.length}` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        if (schema.enum && !schema.enum.some(option => option === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (typeof value === 'string') {
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `String shorter than ${schema.minLength}` });
            }
            if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
        return typeof value;
    }
}

export function formatValidationErrors(errors: ValidationError[]): string {
    return errors.map(e => `${e.path || '<root>'}: ${e.message}`).join('; ');
}
