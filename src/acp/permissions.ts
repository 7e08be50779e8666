// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.
import type {
  RequestPermissionRequest,
  RequestPermissionResponse,
} from "@agentclientprotocol/sdk";
import type { Logger } from "../logger.js";
import { logger as defaultLogger } from "../logger.js";

export interface PermissionConfig {
  /** Approve every tool call the agent asks for. */
  autoApprove: boolean;
  /** Tool titles containing one of these substrings are approved. */
  allowPatterns: string[];
}

/** The assistant only reads tickets; agent tool calls are refused unless configured. */
export const DEFAULT_PERMISSION_CONFIG: PermissionConfig = {
  autoApprove: false,
  allowPatterns: [],
};

function toolTitle(params: RequestPermissionRequest): string {
  return params.toolCall.title ?? params.toolCall.toolCallId;
}

/**
 * Creates the `Client.requestPermission` callback for the ACP client.
 * Approval prefers a one-off grant; refusal prefers a one-off rejection.
 */
export function createPermissionHandler(
  config: PermissionConfig = DEFAULT_PERMISSION_CONFIG,
  log: Logger = defaultLogger,
): (params: RequestPermissionRequest) => Promise<RequestPermissionResponse> {
  return async (params) => {
    const tool = toolTitle(params);
    const { options } = params;

    const allowOption =
      options.find((o) => o.kind === "allow_once") ??
      options.find((o) => o.kind === "allow_always");
    const rejectOption =
      options.find((o) => o.kind === "reject_once") ??
      options.find((o) => o.kind === "reject_always");

    const allowed =
      config.autoApprove || config.allowPatterns.some((pattern) => tool.includes(pattern));

    if (allowed && allowOption) {
      log.debug({ tool, optionId: allowOption.optionId }, "permission approved");
      return { outcome: { outcome: "selected", optionId: allowOption.optionId } };
    }

    if (rejectOption) {
      log.warn({ tool, optionId: rejectOption.optionId }, "permission rejected");
      return { outcome: { outcome: "selected", optionId: rejectOption.optionId } };
    }

    log.warn({ tool }, "permission cancelled — no suitable option");
    return { outcome: { outcome: "cancelled" } };
  };
}
