/**
 * Errors of the access layer: the reconciler and the request path.
 */

import type { MembershipError } from "./membership.js";
import type { RegistryError } from "./registry.js";
import { formatRegistryError } from "./registry.js";
import type { OperationError } from "./coordinator.js";
import { formatOperationError } from "./coordinator.js";

export type AccessError =
  | { kind: "membership_unknown"; error: MembershipError }
  | { kind: "not_member" }
  | { kind: "not_admin" }
  | { kind: "registry_failed"; error: RegistryError }
  | { kind: "coordinator_failed"; error: OperationError };

export function formatAccessError(error: AccessError): string {
  switch (error.kind) {
    case "membership_unknown":
      return `cannot check channel membership (${error.error.message})`;
    case "not_member":
      return "not a member of the channel";
    case "not_admin":
      return "not a channel administrator";
    case "registry_failed":
      return formatRegistryError(error.error);
    case "coordinator_failed":
      return formatOperationError(error.error);
  }
}
