import { Router, Request, Response } from "express";
import { errorMessage } from "../lib/errors";
import type { ExtractionScheduler } from "../services/extractionScheduler";

export function createExtractionRoutes(scheduler: ExtractionScheduler): Router {
  const router = Router();

  /**
   * @swagger
   * /api/extraction/run:
   *   post:
   *     summary: Run an extraction immediately
   *     tags: [Extraction]
   *     responses:
   *       200:
   *         description: Run finished (check status for success or failure)
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/RunSummary'
   *       409:
   *         description: Another run is in progress
   */
  router.post("/run", async (req: Request, res: Response) => {
    try {
      const summary = await scheduler.runNow();
      if (!summary) {
        res.status(409).json({ error: "An extraction run is already in progress" });
        return;
      }
      res.json(summary);
    } catch (error) {
      console.error("Error running extraction:", error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  /**
   * @swagger
   * /api/extraction/status:
   *   get:
   *     summary: Scheduler state and the latest run
   *     tags: [Extraction]
   *     responses:
   *       200:
   *         description: Scheduler status
   */
  router.get("/status", (req: Request, res: Response) => {
    res.json(scheduler.getStatus());
  });

  return router;
}
