import fs from "fs";
import path from "path";
import Ajv2020 from "ajv/dist/2020";
import type { AnySchema, ValidateFunction } from "ajv";
import { bundledPath } from "../paths";

export type JsonValidation<T> = { valid: true; value: T } | { valid: false; errors: string[] };

let ajv: Ajv2020 | null = null;
let schemas: Map<string, AnySchema> | null = null;

function loadSchemas(): Map<string, AnySchema> {
  const schemaDir = bundledPath("schemas");
  const schemaFiles = fs.readdirSync(schemaDir).filter((file) => file.endsWith(".schema.json"));
  const loaded = new Map<string, AnySchema>();
  for (const file of schemaFiles) {
    const schema: AnySchema = JSON.parse(fs.readFileSync(path.join(schemaDir, file), "utf-8"));
    loaded.set(file, schema);
  }
  return loaded;
}

function schemaValidator<T>(schemaFile: string): ValidateFunction<T> | null {
  if (!schemas) {
    schemas = loadSchemas();
  }
  if (!ajv) {
    ajv = new Ajv2020({ allErrors: true });
  }
  const schema = schemas.get(schemaFile);
  if (schema === undefined) {
    return null;
  }
  return ajv.compile<T>(schema);
}

export function validateJson<T>(schemaFile: string, data: unknown): JsonValidation<T> {
  const validate = schemaValidator<T>(schemaFile);
  if (!validate) {
    return { valid: false, errors: [`Schema not found: ${schemaFile}`] };
  }
  if (validate(data)) {
    return { valid: true, value: data };
  }
  const errors = (validate.errors ?? []).map((error) => `${error.instancePath || "/"} ${error.message ?? ""}`.trim());
  return { valid: false, errors };
}
