export type GCPConfig = {
  keyFilename?: string;
};

export interface ApiResponse {
  message: string;
}
export interface ErrorResponse extends ApiResponse {
  success: false;
  error: string;
}

export const INSTANCE_STATUS = {
  RUNNING: "RUNNING",
  TERMINATED: "TERMINATED",
} as const;

/** Read-only view of a provider instance. */
export interface RemoteInstance {
  name: string;
  /** Usually a URL whose last segment is the zone name */
  zone: string;
  status: string;
  machineType: string;
}

export interface InstanceRecord {
  instance_name: string;
  status: string;
  machine_type: string;
}

export type ZoneGrouping = Record<string, InstanceRecord[]>;

export interface InstanceListing {
  "VM instances": ZoneGrouping;
}

export interface OperationWarning {
  code: string;
  message: string;
}

/**
 * Result of polling an operation once. Everything except "pending" is
 * terminal.
 */
export type OperationPoll<T> =
  | { state: "pending" }
  | { state: "done"; result: T }
  | { state: "doneWithWarnings"; result: T; warnings: OperationWarning[] }
  | { state: "failed"; code: string; message: string; cause?: Error };

export interface OperationHandle<T> {
  readonly name: string;
  poll(): Promise<OperationPoll<T>>;
}

export type TransitionAction = "start" | "stop";

/**
 * The compute collaborator: aggregated listing plus start/stop actions that
 * hand back a pollable operation.
 */
export interface InstancesApi {
  aggregatedList(
    projectId: string,
    pageSize: number
  ): AsyncIterable<[scope: string, instances: RemoteInstance[]]>;
  start(
    projectId: string,
    zone: string,
    instance: string
  ): Promise<OperationHandle<unknown>>;
  stop(
    projectId: string,
    zone: string,
    instance: string
  ): Promise<OperationHandle<unknown>>;
}

export type InstancesApiFactory = () => InstancesApi;

export interface SetStateRequest {
  projectId: string;
  zones: string[];
  instanceNames: string[];
}

export interface TransitionResult {
  instance: string;
  zone: string;
  action: TransitionAction;
  operation: string;
}
