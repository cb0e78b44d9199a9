import { isActionName } from "@ledgerkit/types";
import { HANDLERS } from "./handlers.js";
import type { Handler } from "./handlers.js";

/**
 * Handler for `action`, or undefined when the process does not answer it.
 * Matching is exact and case-sensitive.
 */
export function route(action: string | undefined): Handler | undefined {
  if (action === undefined || !isActionName(action)) {
    return undefined;
  }
  return HANDLERS[action];
}
