import {
  InstancesClient,
  ZoneOperationsClient,
  protos,
} from "@google-cloud/compute";
import { gcpConfig } from "../config/gcpConfig";
import type {
  InstancesApi,
  OperationHandle,
  OperationPoll,
  RemoteInstance,
} from "../types";
import logger from "./logger";

type ComputeOperation = protos.google.cloud.compute.v1.IOperation;

/**
 * The parts of InstancesClient this adapter calls.
 */
export interface InstancesClientLike {
  aggregatedListAsync(
    request: protos.google.cloud.compute.v1.IAggregatedListInstancesRequest
  ): AsyncIterable<[string, protos.google.cloud.compute.v1.IInstancesScopedList]>;
  start(
    request: protos.google.cloud.compute.v1.IStartInstanceRequest
  ): Promise<[{ latestResponse?: { name?: string | null } | null }, ...unknown[]]>;
  stop(
    request: protos.google.cloud.compute.v1.IStopInstanceRequest
  ): Promise<[{ latestResponse?: { name?: string | null } | null }, ...unknown[]]>;
}

/**
 * The parts of ZoneOperationsClient this adapter calls.
 */
export interface ZoneOperationsClientLike {
  get(
    request: protos.google.cloud.compute.v1.IGetZoneOperationRequest
  ): Promise<[ComputeOperation, ...unknown[]]>;
}

/**
 * A zone operation polled through ZoneOperationsClient.get. The first
 * terminal poll is kept, so later polls never reach the API again.
 */
export class GceZoneOperation implements OperationHandle<ComputeOperation> {
  private terminal?: OperationPoll<ComputeOperation>;

  constructor(
    private readonly opsClient: ZoneOperationsClientLike,
    private readonly project: string,
    private readonly zone: string,
    public readonly name: string
  ) {}

  async poll(): Promise<OperationPoll<ComputeOperation>> {
    if (this.terminal) return this.terminal;

    const [operation] = await this.opsClient.get({
      project: this.project,
      zone: this.zone,
      operation: this.name,
    });

    if (String(operation.status ?? "UNKNOWN") !== "DONE") {
      return { state: "pending" };
    }

    this.terminal = toTerminalPoll(operation);
    return this.terminal;
  }
}

function toTerminalPoll(
  operation: ComputeOperation
): OperationPoll<ComputeOperation> {
  const errors = operation.error?.errors ?? [];
  if (errors.length > 0) {
    const code =
      errors[0]?.code ?? operation.httpErrorStatusCode ?? "UNKNOWN";
    const message =
      errors
        .map((e) => e.message)
        .filter(Boolean)
        .join("; ") ||
      operation.httpErrorMessage ||
      "Operation failed";
    return { state: "failed", code: String(code), message };
  }

  const warnings = (operation.warnings ?? []).map((warning) => ({
    code: String(warning.code ?? "UNKNOWN"),
    message: warning.message ?? "",
  }));
  if (warnings.length > 0) {
    return { state: "doneWithWarnings", result: operation, warnings };
  }

  return { state: "done", result: operation };
}

function toRemoteInstance(
  instance: protos.google.cloud.compute.v1.IInstance
): RemoteInstance {
  return {
    name: instance.name ?? "",
    zone: instance.zone ?? "",
    status: String(instance.status ?? "UNKNOWN"),
    machineType: instance.machineType ?? "",
  };
}

/**
 * Compute Engine implementation of InstancesApi.
 */
export class GceInstancesApi implements InstancesApi {
  constructor(
    private readonly instancesClient: InstancesClientLike,
    private readonly opsClient: ZoneOperationsClientLike
  ) {}

  async *aggregatedList(
    projectId: string,
    pageSize: number
  ): AsyncIterable<[string, RemoteInstance[]]> {
    const pages = this.instancesClient.aggregatedListAsync({
      project: projectId,
      maxResults: pageSize,
    });

    for await (const [scope, scopedList] of pages) {
      yield [scope, (scopedList.instances ?? []).map(toRemoteInstance)];
    }
  }

  async start(
    projectId: string,
    zone: string,
    instance: string
  ): Promise<GceZoneOperation> {
    const [operation] = await this.instancesClient.start({
      project: projectId,
      zone,
      instance,
    });
    return this.track(operation.latestResponse?.name, projectId, zone, instance);
  }

  async stop(
    projectId: string,
    zone: string,
    instance: string
  ): Promise<GceZoneOperation> {
    const [operation] = await this.instancesClient.stop({
      project: projectId,
      zone,
      instance,
    });
    return this.track(operation.latestResponse?.name, projectId, zone, instance);
  }

  private track(
    operationName: string | null | undefined,
    projectId: string,
    zone: string,
    instance: string
  ): GceZoneOperation {
    if (!operationName) {
      throw new Error(`No operation returned for instance ${instance} in ${zone}`);
    }
    const name = operationName.split("/").pop() ?? operationName;
    logger.debug(`[GCE] Tracking zone operation`, {
      operation: name,
      instance,
      zone,
    });
    return new GceZoneOperation(this.opsClient, projectId, zone, name);
  }
}

/**
 * Builds a fresh adapter with its own clients; called once per request.
 */
export function createGceInstancesApi(): GceInstancesApi {
  return new GceInstancesApi(
    new InstancesClient(gcpConfig),
    new ZoneOperationsClient(gcpConfig)
  );
}
