import express from "express";
import cors from "cors";
import { registerRoutes, type AppServices } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";

export function createApp(services: AppServices): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  registerRoutes(app, services);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
