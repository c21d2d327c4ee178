import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import * as fs from "fs";
import * as yaml from "js-yaml";
import type { ValidationIssue } from "../errors";

function isSchemaObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Process-wide cache of compiled schema validators, so each schema is read
 * and compiled by AJV once.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema file.
   * @param schemaPath Path to a YAML or JSON schema document
   */
  static getValidator(schemaPath: string): ValidateFunction {
    const cached = this.validators.get(schemaPath);
    if (cached) return cached;

    const schema = yaml.load(fs.readFileSync(schemaPath, "utf8"));
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema at ${schemaPath} is not an object`);
    }
    const validator = this.compileWithoutId(schema);
    this.validators.set(schemaPath, validator);
    return validator;
  }

  /**
   * Gets or creates a cached validator for an already parsed schema.
   */
  static getValidatorFromSchema(schema: Record<string, unknown>): ValidateFunction {
    const schemaKey = JSON.stringify(schema);
    const cached = this.schemaValidators.get(schemaKey);
    if (cached) return cached;

    const validator = this.compileWithoutId(schema);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  /**
   * Compiles a copy without `$id` so the same schema can be loaded from a
   * file and from an object without AJV rejecting the duplicate id.
   */
  private static compileWithoutId(schema: Record<string, unknown>): ValidateFunction {
    const { $id: _id, ...schemaWithoutId } = schema;
    return this.getAjv().compile(schemaWithoutId);
  }

  static clearCache(): void {
    this.validators.clear();
    this.schemaValidators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size + this.schemaValidators.size,
      schemasLoaded: Array.from(this.validators.keys()),
    };
  }
}

/**
 * Maps AJV errors to field-level issues. Missing properties point at the
 * property itself rather than its parent.
 */
export function toValidationIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map(error => {
    const missing = error.keyword === "required" && typeof error.params["missingProperty"] === "string"
      ? `/${error.params["missingProperty"]}`
      : "";
    return {
      field: `${error.instancePath}${missing}` || "/",
      message: error.message ?? "is invalid",
      value: error.data,
    };
  });
}
