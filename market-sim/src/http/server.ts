/**
 * HTTP surface for on-demand simulation runs
 */

import { Logger } from "@housing-sim/shared-utils";
import { randomUUID } from "crypto";
import express, {
  Express,
  NextFunction,
  Request,
  Response,
  Router,
} from "express";
import { z } from "zod";
import { SimulationConfig } from "../core/dto";
import { isMarketError } from "../core/errors";
import { SimulationHandlers } from "../core/handlers";
import { runSimulation } from "../core/simulation";
import {
  propertyRowsSchema,
  resolveSimulationConfig,
} from "../core/validation";

export interface ApiDependencies {
  handlers: SimulationHandlers;
  defaults: SimulationConfig;
  logger: Logger;
  maxRowsPerRequest: number;
}

// Either inline market rows or the id of a stored market
function simulateRequestSchema(maxRows: number) {
  const config = z.record(z.unknown()).optional();
  return z.union([
    z.object({ rows: propertyRowsSchema.max(maxRows), config }).strict(),
    z.object({ marketId: z.string().min(1), config }).strict(),
  ]);
}

export class SimulationRoutes {
  readonly router: Router = Router();
  private bodySchema: ReturnType<typeof simulateRequestSchema>;

  constructor(private deps: ApiDependencies) {
    this.bodySchema = simulateRequestSchema(deps.maxRowsPerRequest);

    this.router.get("/health", (_req, res) => {
      res.json({ ok: true, ...this.deps.handlers.getMetrics() });
    });

    this.router.post("/simulations", (req, res, next) => {
      this.handleSimulate(req, res).catch(next);
    });
  }

  private async handleSimulate(req: Request, res: Response): Promise<void> {
    const body = this.bodySchema.parse(req.body);
    const runId = randomUUID();

    if ("rows" in body) {
      const config = resolveSimulationConfig(this.deps.defaults, body.config);
      const report = runSimulation(body.rows, config, {
        runId,
        logger: this.deps.logger,
      });
      res.json(report);
      return;
    }

    const report = await this.deps.handlers.simulate(
      runId,
      body.marketId,
      body.config
    );
    res.json(report);
  }
}

/**
 * Map validation and domain errors onto HTTP status codes
 */
export function errorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof z.ZodError) {
      res.status(400).json({
        error: "Validation error",
        errors: error.errors.map((e) => ({
          path: e.path.join("."),
          message: e.message,
        })),
      });
      return;
    }

    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }

    if (isMarketError(error)) {
      res
        .status(error.kind === "NotFound" ? 404 : 422)
        .json({ error: error.kind, message: error.message });
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.url}:`, error);
    res.status(500).json({ error: "Internal server error" });
  };
}

export function createApp(deps: ApiDependencies): Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));
  app.use(new SimulationRoutes(deps).router);
  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.url} not found` });
  });
  app.use(errorHandler(deps.logger));
  return app;
}
