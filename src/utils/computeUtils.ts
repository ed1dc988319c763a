import { LIST_PAGE_SIZE, OPERATION_TIMEOUT_MS } from "../config/gcpConfig";
import {
  INSTANCE_STATUS,
  InstanceListing,
  InstancesApi,
  RemoteInstance,
  SetStateRequest,
  TransitionAction,
  TransitionResult,
  ZoneGrouping,
} from "../types";
import { errorMessage, StateTransitionError } from "./errors";
import logger from "./logger";
import { waitForOperation, WaitOptions } from "./operationWaiter";

export function zoneName(zone: string): string {
  return zone.split("/").pop() ?? zone;
}

export async function listInstances(
  api: InstancesApi,
  projectId: string,
  requestId: string
): Promise<InstanceListing> {
  const functionName = "listInstances";
  logger.debug(
    `[${requestId || "system"}] [${functionName}] Listing instances`,
    { projectId, pageSize: LIST_PAGE_SIZE }
  );

  try {
    const grouping: ZoneGrouping = {};
    let total = 0;

    for await (const [scope, instances] of api.aggregatedList(
      projectId,
      LIST_PAGE_SIZE
    )) {
      if (instances.length === 0) continue;
      grouping[scope] = instances.map((instance) => ({
        instance_name: instance.name,
        status: instance.status,
        machine_type: instance.machineType,
      }));
      total += instances.length;
    }

    logger.info(
      `[${requestId || "system"}] [${functionName}] Listed instances`,
      { projectId, zones: Object.keys(grouping).length, instances: total }
    );
    return { "VM instances": grouping };
  } catch (error) {
    logger.error(
      `[${requestId || "system"}] [${functionName}] Failed to list instances`,
      { projectId, error: errorMessage(error) }
    );
    throw error;
  }
}

function actionFor(status: string): TransitionAction | null {
  switch (status) {
    case INSTANCE_STATUS.TERMINATED:
      return "start";
    case INSTANCE_STATUS.RUNNING:
      return "stop";
    default:
      return null;
  }
}

async function transition(
  api: InstancesApi,
  projectId: string,
  instance: RemoteInstance,
  action: TransitionAction,
  waitOptions: WaitOptions
): Promise<TransitionResult> {
  const zone = zoneName(instance.zone);
  const operation =
    action === "start"
      ? await api.start(projectId, zone, instance.name)
      : await api.stop(projectId, zone, instance.name);

  await waitForOperation(
    operation,
    action === "start" ? "instance starting" : "instance stopping",
    waitOptions
  );

  return { instance: instance.name, zone, action, operation: operation.name };
}

/**
 * Starts every matching TERMINATED instance and stops every matching
 * RUNNING one, one at a time. The first failure aborts the batch.
 */
export async function setInstanceStates(
  api: InstancesApi,
  request: SetStateRequest,
  requestId: string,
  waitOptions: WaitOptions = { timeoutMs: OPERATION_TIMEOUT_MS }
): Promise<TransitionResult[]> {
  const functionName = "setInstanceStates";
  const { projectId } = request;
  const names = new Set(request.instanceNames);
  const zones = new Set(request.zones);
  const completed: TransitionResult[] = [];

  logger.info(
    `[${requestId || "system"}] [${functionName}] Setting instance states`,
    { projectId, zones: request.zones, instances: request.instanceNames }
  );

  try {
    for await (const [, instances] of api.aggregatedList(
      projectId,
      LIST_PAGE_SIZE
    )) {
      for (const instance of instances) {
        if (!names.has(instance.name) || !zones.has(zoneName(instance.zone))) {
          continue;
        }

        const action = actionFor(instance.status);
        if (!action) {
          logger.info(
            `[${requestId || "system"}] [${functionName}] Skipping instance with unsupported status`,
            { instance: instance.name, status: instance.status }
          );
          continue;
        }

        logger.debug(
          `[${requestId || "system"}] [${functionName}] Transitioning instance`,
          { instance: instance.name, zone: zoneName(instance.zone), action }
        );
        const result = await transition(
          api,
          projectId,
          instance,
          action,
          waitOptions
        );
        completed.push(result);
        logger.info(
          `[${requestId || "system"}] [${functionName}] Instance transition completed`,
          { ...result }
        );
      }
    }
  } catch (error) {
    logger.error(
      `[${requestId || "system"}] [${functionName}] Aborting state changes`,
      { projectId, completed: completed.length, error: errorMessage(error) }
    );
    throw new StateTransitionError(
      error instanceof Error ? error : new Error(String(error)),
      completed
    );
  }

  logger.info(
    `[${requestId || "system"}] [${functionName}] Instance states set`,
    { projectId, transitions: completed.length }
  );
  return completed;
}
