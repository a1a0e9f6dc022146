import * as fs from "node:fs";
import { ConfigurationError, errorMessage } from "../core/index.js";
import type { ServiceAccountKey } from "./types.js";

/**
 * Read a service-account JSON key (the file downloaded from the Cloud
 * console). Any problem here is a configuration error and stops the run
 * before the first import.
 */
export function loadServiceAccountKey(filePath: string): ServiceAccountKey {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read credentials file ${filePath}: ${errorMessage(err)}`,
      err,
    );
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("client_email" in parsed) ||
    !("private_key" in parsed) ||
    typeof parsed.client_email !== "string" ||
    typeof parsed.private_key !== "string" ||
    parsed.client_email === "" ||
    parsed.private_key === ""
  ) {
    throw new ConfigurationError(
      `Credentials file ${filePath} is not a service account key (client_email and private_key are required)`,
    );
  }

  return { clientEmail: parsed.client_email, privateKey: parsed.private_key };
}
