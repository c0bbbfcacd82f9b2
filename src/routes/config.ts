/**
 * Client configuration endpoint.
 *
 * GET /api/config — base URL and display name clients use to build share links.
 */

import { Router, Request, Response } from "express";
import { env } from "../config/env";

const configRouter = Router();

configRouter.get("/", (_req: Request, res: Response) => {
  res.status(200).json({
    baseUrl: env.BASE_URL,
    appName: env.APP_NAME,
  });
});

export { configRouter };
