#!/usr/bin/env node
import "dotenv/config";
import { startServer } from "@/bootstrap/startServer";
import { logger } from "@/common/logger";

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, "Failed to start server");
  process.exitCode = 1;
});
