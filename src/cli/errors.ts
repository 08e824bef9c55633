import { consola } from "consola";

import { isTagCloudError } from "../core/errors.ts";

export function exitWithError(error: unknown): never {
  if (isTagCloudError(error)) {
    consola.error(error.message);
    process.exit(1);
  }
  throw error;
}
