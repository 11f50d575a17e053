import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject, Options, ValidateFunction } from "ajv";

export type AjvInstance = {
  compile<T>(schema: object): ValidateFunction<T>;
  errorsText(errors?: ErrorObject[] | null): string;
};

let shared: AjvInstance | null = null;

/** Draft 2020-12 validator with `uri` and friends registered. */
export function loadAjv(): AjvInstance {
  if (shared) return shared;

  // Both packages are CommonJS; their default export is the module itself under NodeNext.
  const AjvCtor = Ajv2020 as unknown as { new (opts: Options): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  shared = ajv;
  return ajv;
}
