/**
 * Paste routes.
 *
 * POST   /api/pastes                      — Create a paste (rate limited)
 * GET    /api/pastes/public               — Public pastes, newest first (?page, ?size)
 * GET    /api/pastes/search?q=            — Search public pastes by title/content
 * GET    /api/pastes/language/:language   — Public pastes in a language
 * GET    /api/pastes/recent               — Public pastes from the last 24 hours
 * GET    /api/pastes/stats                — Aggregate statistics
 * GET    /api/pastes/:id                  — Read a paste (?password= or X-Paste-Password)
 * PUT    /api/pastes/:id                  — Update title/content/language/visibility
 * DELETE /api/pastes/:id                  — Soft-delete a paste
 *
 * Pages are zero-based; size defaults to 20 and is capped at 100.
 */

import { Router, Request, Response, NextFunction } from "express";
import { createLimiter } from "../middleware/rateLimiter";
import type { Page, PublicPaste } from "../models/paste";
import { ValidationError } from "../services/errors";
import type { PasteService } from "../services/pasteService";
import { parsePageRequest } from "../services/pasteValidation";

function pageBody(page: Page<PublicPaste>) {
  return {
    pastes: page.items,
    pagination: {
      page: page.page,
      size: page.size,
      total: page.total,
      totalPages: page.totalPages,
    },
  };
}

/** Password from the query string, falling back to the X-Paste-Password header. */
function suppliedPassword(req: Request): string | undefined {
  const fromQuery = req.query.password;
  if (typeof fromQuery === "string") {
    return fromQuery;
  }
  return req.header("x-paste-password");
}

export function createPastesRouter(pasteService: PasteService): Router {
  const pastesRouter = Router();

  // -------------------------------------------------------------------------
  // POST / — Create
  // -------------------------------------------------------------------------

  pastesRouter.post(
    "/",
    createLimiter,
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const paste = await pasteService.create(req.body);
        res.status(201).json({ paste });
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Listings (registered before /:id so the literal paths win)
  // -------------------------------------------------------------------------

  pastesRouter.get(
    "/public",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const page = await pasteService.listPublic(parsePageRequest(req.query));
        res.status(200).json(pageBody(page));
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  pastesRouter.get(
    "/search",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const term = typeof req.query.q === "string" ? req.query.q.trim() : "";
        if (!term) {
          throw new ValidationError([{ field: "q", message: "Search term is required" }]);
        }

        const page = await pasteService.search(term, parsePageRequest(req.query));
        res.status(200).json(pageBody(page));
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  pastesRouter.get(
    "/language/:language",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const page = await pasteService.listByLanguage(
          req.params.language,
          parsePageRequest(req.query)
        );
        res.status(200).json(pageBody(page));
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  pastesRouter.get(
    "/recent",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const page = await pasteService.listRecent(parsePageRequest(req.query));
        res.status(200).json(pageBody(page));
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  pastesRouter.get(
    "/stats",
    async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        res.status(200).json(await pasteService.statistics());
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Single paste
  // -------------------------------------------------------------------------

  pastesRouter.get(
    "/:id",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const paste = await pasteService.get(req.params.id, suppliedPassword(req));
        res.status(200).json({ paste });
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  pastesRouter.put(
    "/:id",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const paste = await pasteService.update(req.params.id, req.body);
        res.status(200).json({ paste });
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  pastesRouter.delete(
    "/:id",
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        await pasteService.delete(req.params.id);
        res.status(204).end();
      } catch (err: unknown) {
        next(err);
      }
    }
  );

  return pastesRouter;
}
