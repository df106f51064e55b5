import { Router, Request, Response } from "express";
import type { AppConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import type { ResultStore, StoreFactory } from "../services/resultStore";
import type { AddressKind } from "../types";

export function createIpRoutes(config: AppConfig, openStore: StoreFactory): Router {
  const router = Router();

  const listAddresses = (kind: AddressKind) => async (req: Request, res: Response) => {
    let store: ResultStore | null = null;
    try {
      store = await openStore(config);
      const ips = await store.listAll(kind);
      res.json({ ips, total: ips.length });
    } catch (error) {
      console.error(`Error fetching ${kind} IPs:`, error);
      res.status(500).json({ error: errorMessage(error) });
    } finally {
      if (store) {
        await store.close().catch((error: unknown) => {
          console.error("⚠️  [Result Store] Failed to close connection:", error);
        });
      }
    }
  };

  /**
   * @swagger
   * /api/ips/private:
   *   get:
   *     summary: Private (RFC 1918) addresses found by the latest run
   *     tags: [IPs]
   *     responses:
   *       200:
   *         description: Addresses in lexicographic order
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/IpList'
   *       500:
   *         description: Result store unavailable
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Error'
   */
  router.get("/private", listAddresses("private"));

  /**
   * @swagger
   * /api/ips/public:
   *   get:
   *     summary: Public addresses found by the latest run
   *     tags: [IPs]
   *     responses:
   *       200:
   *         description: Addresses in lexicographic order
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/IpList'
   *       500:
   *         description: Result store unavailable
   */
  router.get("/public", listAddresses("public"));

  return router;
}
