/**
 * API Route Index
 *
 * All routes are mounted under the /api prefix (set in app.ts).
 *
 * ┌─────────────────────────────────────┬────────┬──────────────────────────────────────────┐
 * │ Endpoint                            │ Method │ Description                              │
 * ├─────────────────────────────────────┼────────┼──────────────────────────────────────────┤
 * │ /api/health                         │ GET    │ Store connectivity, scheduler, memory    │
 * │ /api/config                         │ GET    │ Base URL + app name for clients          │
 * ├─────────────────────────────────────┼────────┼──────────────────────────────────────────┤
 * │ /api/pastes                         │ POST   │ Create a paste                           │
 * │ /api/pastes/public                  │ GET    │ Public pastes (?page, ?size)             │
 * │ /api/pastes/search?q=               │ GET    │ Search public pastes                     │
 * │ /api/pastes/language/:language      │ GET    │ Public pastes in a language              │
 * │ /api/pastes/recent                  │ GET    │ Public pastes from the last 24 hours     │
 * │ /api/pastes/stats                   │ GET    │ Aggregate statistics                     │
 * │ /api/pastes/:id                     │ GET    │ Read (?password= / X-Paste-Password)     │
 * │ /api/pastes/:id                     │ PUT    │ Update title/content/language/visibility │
 * │ /api/pastes/:id                     │ DELETE │ Soft-delete                              │
 * ├─────────────────────────────────────┼────────┼──────────────────────────────────────────┤
 * │ /api/admin/sweep                    │ POST   │ Run the expiry sweep now (admin key)     │
 * │ /api/admin/sweep/next               │ GET    │ Next scheduled sweep (admin key)         │
 * │ /api/admin/metrics                  │ GET    │ In-memory metrics (admin key)            │
 * └─────────────────────────────────────┴────────┴──────────────────────────────────────────┘
 *
 * Error responses follow the shape: { error: { message, code, details?, requestId } }
 */

import { Router } from "express";
import type { PasteService } from "../services/pasteService";
import type { PasteStore } from "../services/pasteStore";
import { createAdminRouter } from "./admin";
import { configRouter } from "./config";
import { createHealthRouter } from "./health";
import { createPastesRouter } from "./pastes";

export interface ApiDependencies {
  pasteService: PasteService;
  store: PasteStore;
}

export function createApiRouter({ pasteService, store }: ApiDependencies): Router {
  const router = Router();

  router.use("/health", createHealthRouter(store));
  router.use("/config", configRouter);
  router.use("/pastes", createPastesRouter(pasteService));
  router.use("/admin", createAdminRouter(pasteService));

  return router;
}
