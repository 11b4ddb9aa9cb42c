/**
 * Operation Status Service
 *
 * Looks up Lightsail operations by id. Implements IOperationSource so the
 * generic reconciler can poll Lightsail without knowing its status names.
 */

import { LightsailClient, GetOperationCommand } from "@aws-sdk/client-lightsail";
import type {
  IOperationSource,
  OperationPhase,
  OperationSnapshot,
} from "@skyform/adapters-common";
import { AwsErrorHandler } from "../../errors";
import { toOperationSnapshot } from "../types";

const SUCCEEDED_STATUSES = ["Succeeded", "Completed"];
const FAILED_STATUSES = ["Failed"];

export class OperationStatusService implements IOperationSource {
  constructor(private readonly client: LightsailClient) {}

  /**
   * Returns undefined when Lightsail answers without an operation.
   * A NotFoundException is rethrown so the caller can tell lag from misuse.
   */
  async getOperation(operationId: string): Promise<OperationSnapshot | undefined> {
    const result = await this.client.send(
      new GetOperationCommand({ operationId })
    );

    return result.operation ? toOperationSnapshot(result.operation) : undefined;
  }

  classifyStatus(status: string): OperationPhase {
    if (SUCCEEDED_STATUSES.includes(status)) return "succeeded";
    if (FAILED_STATUSES.includes(status)) return "failed";
    return "pending";
  }

  isTransientError(error: unknown): boolean {
    return AwsErrorHandler.isTransient(error);
  }

  isNotFoundError(error: unknown): boolean {
    return AwsErrorHandler.isResourceNotFound(error);
  }
}
