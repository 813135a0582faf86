import type { IntakeLogger } from "@/logging/create-log";
import type { Toolkit } from "@/toolkit/types";

export interface RestConfig {
  /** Route prefix, e.g. "/api" ("" mounts at the root) */
  baseUrl: string;
  /** Where uploads are stored and downloads are served from */
  uploadDir: string;
  diagnostics?: boolean;
  logger?: IntakeLogger;
}

export interface CreateIntakeRestAppParams extends RestConfig {
  toolkit: Toolkit;
}
