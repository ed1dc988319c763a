import { createApp } from "./app";
import { OPERATION_TIMEOUT_MS, PORT } from "./config/gcpConfig";
import { createGceInstancesApi } from "./utils/gcpCompute";
import logger from "./utils/logger";

logger.info("Starting Compute Instance Toggle service...", {
  port: PORT,
  operationTimeoutMs: OPERATION_TIMEOUT_MS,
});

const app = createApp({ instancesApiFactory: createGceInstancesApi });

app.listen(PORT, () => {
  logger.info(`Server is running on ${PORT}`);
});
