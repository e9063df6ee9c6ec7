/**
 * Schema Validator - JSON schema validation for external inputs
 * (task records, diagnosis replies, memory snapshots)
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type?: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    /** Schema applied to every value of a map-like object. */
    additionalProperties?: JsonSchema;
    items?: JsonSchema;
    enum?: readonly (string | number | boolean | null)[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minItems?: number;
    /** Id of another registered schema; allows recursive shapes. */
    ref?: string;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    hasSchema(schemaId: string): boolean {
        return this.schemas.has(schemaId);
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
        if (schema.ref) {
            const target = this.schemas.get(schema.ref);
            if (!target) {
                errors.push({ path, message: `Schema not found: ${schema.ref}` });
                return;
            }
            this.validateValue(value, target, path, errors);
            return;
        }

        // Type validation
        if (schema.type) {
            const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
            if (!allowed.some((t) => this.matchesType(value, t))) {
                errors.push({
                    path,
                    message: `Expected type ${allowed.join('|')}, got ${this.getType(value)}`,
                });
                return;
            }
        }

        // Object validation
        if (isPlainObject(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            if (schema.properties) {
                for (const [key, propSchema] of Object.entries(schema.properties)) {
                    if (key in value) {
                        this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                    }
                }
            }

            if (schema.additionalProperties) {
                for (const [key, entry] of Object.entries(value)) {
                    if (schema.properties && key in schema.properties) continue;
                    this.validateValue(entry, schema.additionalProperties, `${path}.${key}`, errors);
                }
            }
        }

        // Array validation
        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} items, got ${value.length}` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.some((allowed) => allowed === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        // Pattern validation
        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        // Number range validation
        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private matchesType(value: unknown, type: JsonType): boolean {
        if (type === 'integer') return Number.isInteger(value);
        if (type === 'number') return typeof value === 'number' && Number.isFinite(value);
        return this.getType(value) === type;
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}
