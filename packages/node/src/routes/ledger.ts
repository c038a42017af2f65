/**
 * Settlement ledger routes.
 *
 * GET  /api/v1/ledger/:account  - Balance and allowance to the treasury
 * POST /api/v1/ledger/approve   - Caller lets the treasury collect up to an amount
 * POST /api/v1/ledger/mint      - Development faucet (only with DEV_FAUCET)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveSchema, MintSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";

export interface LedgerRouteOptions {
  readonly devFaucet?: boolean;
}

export function createLedgerRoutes(options: LedgerRouteOptions = {}): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/approve", validateBody(ApproveSchema), (c) => {
    const { amount } = c.req.valid("json");
    const view = c.get("service").approveTreasury(callerOf(c), amount);
    return c.json({ data: view });
  });

  if (options.devFaucet === true) {
    routes.post("/mint", validateBody(MintSchema), (c) => {
      const { to, amount } = c.req.valid("json");
      return c.json({ data: c.get("service").mint(to, amount) });
    });
  }

  routes.get("/:account", (c) => {
    return c.json({ data: c.get("service").ledgerAccount(c.req.param("account")) });
  });

  return routes;
}
