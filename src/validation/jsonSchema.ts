import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import captureManifestSchema from "../../schemas/capture_manifest.schema.json";
import { CaptureManifest } from "../types/captureManifest";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

let manifestValidator: ValidateFunction<CaptureManifest> | null = null;

export function getManifestValidator(): ValidateFunction<CaptureManifest> {
  if (!manifestValidator) {
    manifestValidator = ajv.compile<CaptureManifest>(captureManifestSchema);
  }
  return manifestValidator;
}

export function assertValidSchema<T>(
  validator: ValidateFunction<T>,
  data: unknown,
  label: string
): asserts data is T {
  const valid = validator(data);
  if (valid) return;
  const errors = (validator.errors ?? [])
    .map((error) => `${error.instancePath || "<root>"} ${error.message}`)
    .join("; ");
  throw new Error(`${label} failed schema validation: ${errors}`);
}
