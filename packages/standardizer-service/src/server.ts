// src/server.ts
import express, { type Express } from "express";
import type { Server } from "node:http";
import { createApiRouter } from "./api-routes.js";
import type { StandardizationService } from "./service.js";

export const createApp = (service: StandardizationService): Express => {
  const app = express();

  app.use(express.json({ limit: "10mb" }));
  app.use("/api", createApiRouter(service));

  app.get("/health", (req, res) => {
    res.status(200).send("OK");
  });

  return app;
};

const logEndpoints = (port: number) => {
  console.log(`Server is running on http://localhost:${port}`);
  console.log(`API endpoints:`);
  console.log(`  GET    /api/health - Health check`);
  console.log(`  GET    /api/teams - All teams by sport`);
  console.log(`  GET    /api/teams/:sport - Teams for a sport`);
  console.log(`  POST   /api/teams - Add a team`);
  console.log(`  POST   /api/standardize - Standardize a team name`);
  console.log(`  POST   /api/process?sport=...&autoSave=... - Standardize a JSON document`);
  console.log(`  GET    /api/search?sport=...&q=... - Search for teams`);
  console.log(`  POST   /api/save - Save the registry`);
  console.log(`  GET    /api/newly-added - Teams added this session`);
  console.log(`  DELETE /api/newly-added - Clear the session log`);
  console.log(`  GET    /api/stats - Registry statistics`);
  console.log(`  PUT    /api/thresholds - Update thresholds`);
};

export const startServer = (service: StandardizationService, port: number): Promise<Server> =>
  new Promise((resolve, reject) => {
    const app = createApp(service);
    const server = app.listen(port, () => {
      const address = server.address();
      logEndpoints(address !== null && typeof address === "object" ? address.port : port);
      resolve(server);
    });
    server.on("error", reject);

    // Graceful shutdown
    const shutdown = () => {
      console.log("\nShutting down gracefully...");
      server.close(() => {
        service.close();
        process.exit(0);
      });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
