import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { FlipEvaluationRequestV0 } from "../types/inputs.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

type AjvError = { instancePath?: string; message?: string };

type AjvValidateFunction = ((data: unknown) => boolean) & {
  errors?: AjvError[] | null;
};

type AjvValidator = {
  compile: (schema: unknown) => AjvValidateFunction;
};

// ajv ships CommonJS with a `default` property; the ESM default import is module.exports
type AjvConstructor = new (opts: Record<string, unknown>) => AjvValidator;
type AddFormatsPlugin = (instance: AjvValidator) => void;

export const CONTRACT_SCHEMA_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "..",
  "..",
  "contracts",
  "flip_evaluation_v0.schema.json",
);

let compiled: AjvValidateFunction | null = null;

function getValidator(): AjvValidateFunction {
  if (compiled) {
    return compiled;
  }

  const schema = JSON.parse(readFileSync(CONTRACT_SCHEMA_PATH, "utf8")) as Record<string, unknown>;

  const ajvModule = Ajv2020 as unknown as AjvConstructor & { default?: AjvConstructor };
  const AjvClass = ajvModule.default ?? ajvModule;
  const formatsModule = addFormats as unknown as AddFormatsPlugin & { default?: AddFormatsPlugin };
  const addFormatsPlugin = formatsModule.default ?? formatsModule;

  const ajv = new AjvClass({ strict: true, allErrors: true });
  addFormatsPlugin(ajv);

  compiled = ajv.compile(schema);
  return compiled;
}

export function validateRequest(request: unknown): ValidationResult {
  try {
    const validate = getValidator();
    if (validate(request)) {
      return { valid: true, errors: [] };
    }

    const errors = (validate.errors ?? []).map((error) => {
      const path = error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/";
      const message = error.message ?? "invalid";
      return `${path}: ${message}`;
    });

    return { valid: false, errors };
  } catch (error) {
    return {
      valid: false,
      errors: [error instanceof Error ? error.message : "Validation failed"],
    };
  }
}

export function isFlipEvaluationRequest(request: unknown): request is FlipEvaluationRequestV0 {
  return validateRequest(request).valid;
}
