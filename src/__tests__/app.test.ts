import request from "supertest";
import { createApp } from "../app";
import logger from "../utils/logger";
import { FakeInstancesApi, instance, ScriptedOperation } from "./fakeCompute";

const MACHINE = "https://www.googleapis.com/compute/v1/projects/test-project/zones";

function appWith(api: FakeInstancesApi) {
  const instancesApiFactory = jest.fn(() => api);
  const app = createApp({
    instancesApiFactory,
    waitOptions: { timeoutMs: 50, pollIntervalMs: 5 },
  });
  return { app, instancesApiFactory };
}

describe("HTTP routes", () => {
  beforeEach(() => {
    for (const level of ["debug", "info", "warn", "error"] as const) {
      jest.spyOn(logger, level).mockImplementation(() => undefined);
    }
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("GET /ping", () => {
    it("answers the liveness check", async () => {
      const { app } = appWith(new FakeInstancesApi());

      const res = await request(app).get("/ping").expect(200);

      expect(res.body).toEqual({ key: "value" });
    });
  });

  describe("GET /health", () => {
    it("reports status and uptime", async () => {
      const { app } = appWith(new FakeInstancesApi());

      const res = await request(app).get("/health").expect(200);

      expect(res.body.status).toBe("ok");
      expect(typeof res.body.uptime).toBe("number");
    });
  });

  describe("GET /get_compute_engine", () => {
    it("returns an empty grouping for a project without instances", async () => {
      const { app } = appWith(new FakeInstancesApi([["zones/us-east1-b", []]]));

      const res = await request(app)
        .get("/get_compute_engine")
        .query({ project_id: "test-project" })
        .expect(200);

      expect(res.body).toEqual({ "VM instances": {} });
      expect(res.text).toBe('{\n  "VM instances": {}\n}');
    });

    it("returns instances grouped by zone as sorted, indented JSON", async () => {
      const api = new FakeInstancesApi([
        ["zones/us-west1-a", [instance("db-1", "us-west1-a", "TERMINATED")]],
        [
          "zones/us-east1-b",
          [
            instance("web-1", "us-east1-b", "RUNNING"),
            instance("web-2", "us-east1-b", "RUNNING"),
          ],
        ],
      ]);
      const { app, instancesApiFactory } = appWith(api);

      const res = await request(app)
        .get("/get_compute_engine")
        .query({ project_id: "test-project" })
        .expect("Content-Type", /application\/json/)
        .expect(200);

      const expected = {
        "VM instances": {
          "zones/us-east1-b": [
            {
              instance_name: "web-1",
              machine_type: `${MACHINE}/us-east1-b/machineTypes/e2-medium`,
              status: "RUNNING",
            },
            {
              instance_name: "web-2",
              machine_type: `${MACHINE}/us-east1-b/machineTypes/e2-medium`,
              status: "RUNNING",
            },
          ],
          "zones/us-west1-a": [
            {
              instance_name: "db-1",
              machine_type: `${MACHINE}/us-west1-a/machineTypes/e2-medium`,
              status: "TERMINATED",
            },
          ],
        },
      };
      expect(res.text).toBe(JSON.stringify(expected, null, 2));
      expect(Object.keys(res.body["VM instances"])).toEqual([
        "zones/us-east1-b",
        "zones/us-west1-a",
      ]);
      expect(api.listCalls).toEqual([{ projectId: "test-project", pageSize: 50 }]);
      expect(instancesApiFactory).toHaveBeenCalledTimes(1);
    });

    it("rejects a request without project_id", async () => {
      const { app, instancesApiFactory } = appWith(new FakeInstancesApi());

      const res = await request(app).get("/get_compute_engine").expect(422);

      expect(res.body).toEqual({
        success: false,
        error: "Validation",
        message: "Invalid request",
        details: [{ path: "project_id", message: "Required" }],
      });
      expect(instancesApiFactory).not.toHaveBeenCalled();
    });

    it("hides unexpected provider errors behind a 500", async () => {
      const api = new FakeInstancesApi();
      jest.spyOn(api, "aggregatedList").mockImplementation(() => ({
        [Symbol.asyncIterator]: () => ({
          next: () => Promise.reject(new Error("Could not load the default credentials")),
        }),
      }));
      const { app } = appWith(api);

      const res = await request(app)
        .get("/get_compute_engine")
        .query({ project_id: "test-project" })
        .expect(500);

      expect(res.body).toEqual({
        success: false,
        error: "Internal Server Error",
        message: "Something went wrong",
      });
    });
  });

  describe("POST /set_state", () => {
    it("toggles matching instances and reports success", async () => {
      const api = new FakeInstancesApi([
        [
          "zones/us-east1-b",
          [
            instance("web-1", "us-east1-b", "RUNNING"),
            instance("web-2", "us-east1-b", "TERMINATED"),
          ],
        ],
        ["zones/us-west1-a", [instance("web-1", "us-west1-a", "RUNNING")]],
      ]);
      const { app } = appWith(api);

      const res = await request(app)
        .post("/set_state")
        .send({
          project_id: "test-project",
          zones: ["us-east1-b"],
          instances_names: ["web-1", "web-2"],
        })
        .expect(200);

      expect(res.body).toEqual({ results: "status set" });
      expect(api.stop).toHaveBeenCalledTimes(1);
      expect(api.stop).toHaveBeenCalledWith("test-project", "us-east1-b", "web-1");
      expect(api.start).toHaveBeenCalledTimes(1);
      expect(api.start).toHaveBeenCalledWith("test-project", "us-east1-b", "web-2");
    });

    it("rejects a malformed payload", async () => {
      const { app, instancesApiFactory } = appWith(new FakeInstancesApi());

      const res = await request(app)
        .post("/set_state")
        .send({ project_id: "test-project", zones: "us-east1-b" })
        .expect(422);

      expect(res.body.error).toBe("Validation");
      expect(res.body.details).toEqual([
        { path: "zones", message: "Expected array, received string" },
        { path: "instances_names", message: "Required" },
      ]);
      expect(instancesApiFactory).not.toHaveBeenCalled();
    });

    it("answers 400 for a body that is not JSON", async () => {
      const { app } = appWith(new FakeInstancesApi());

      const res = await request(app)
        .post("/set_state")
        .set("Content-Type", "application/json")
        .send("{not json")
        .expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error).toBe("Bad Request");
    });

    it("reports a timeout with the transitions already completed", async () => {
      const api = new FakeInstancesApi([
        [
          "zones/us-east1-b",
          [
            instance("web-1", "us-east1-b", "RUNNING"),
            instance("web-2", "us-east1-b", "RUNNING"),
          ],
        ],
      ]);
      api.stop
        .mockResolvedValueOnce(
          new ScriptedOperation("op-1", [{ state: "done", result: null }])
        )
        .mockResolvedValueOnce(new ScriptedOperation("op-2", [{ state: "pending" }]));
      const { app } = appWith(api);

      const res = await request(app)
        .post("/set_state")
        .send({
          project_id: "test-project",
          zones: ["us-east1-b"],
          instances_names: ["web-1", "web-2"],
        })
        .expect(500);

      expect(res.body).toEqual({
        success: false,
        error: "Timeout",
        message: "Timed out after 0.05s waiting for instance stopping (op-2)",
        completed: [
          { instance: "web-1", zone: "us-east1-b", action: "stop", operation: "op-1" },
        ],
      });
    });

    it("reports a failed operation", async () => {
      const api = new FakeInstancesApi([
        ["zones/us-east1-b", [instance("web-1", "us-east1-b", "TERMINATED")]],
      ]);
      api.start.mockResolvedValueOnce(
        new ScriptedOperation("op-1", [
          { state: "failed", code: "QUOTA_EXCEEDED", message: "Quota 'CPUS' exceeded" },
        ])
      );
      const { app } = appWith(api);

      const res = await request(app)
        .post("/set_state")
        .send({
          project_id: "test-project",
          zones: ["us-east1-b"],
          instances_names: ["web-1"],
        })
        .expect(500);

      expect(res.body).toEqual({
        success: false,
        error: "OperationFailed",
        message: "Quota 'CPUS' exceeded",
        completed: [],
      });
    });
  });

  it("answers 404 for unknown routes", async () => {
    const { app } = appWith(new FakeInstancesApi());

    const res = await request(app).get("/instances").expect(404);

    expect(res.body).toEqual({
      success: false,
      error: "Not Found",
      message: "Endpoint not found",
    });
  });
});
