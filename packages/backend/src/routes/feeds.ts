import { Router } from "express";
import { z } from "zod";
import type {
  LatestRssFeedsResponse,
  LatestWarningLettersResponse,
  RssFeedItem,
  WarningLetterItem
} from "@regintel/shared";
import { validate } from "../middleware/validator.js";

export const MAX_LATEST_ITEMS = 5;

// Negative limits clamp to an empty listing.
const latestQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .default(10)
    .transform((limit) => Math.max(limit, 0))
});

type LatestQuery = z.infer<typeof latestQuerySchema>;

function placeholderCount(limit: number): number {
  return Math.min(limit, MAX_LATEST_ITEMS);
}

function buildRssFeedItems(limit: number): RssFeedItem[] {
  return Array.from({ length: placeholderCount(limit) }, (_, index) => ({
    id: `feed_${index + 1}`,
    title: `Regulatory Update ${index + 1}`,
    content: "Latest regulatory news and updates from various sources",
    published_at: "2025-08-18T20:00:00Z",
    source: "Regulatory News Feed"
  }));
}

function buildWarningLetterItems(limit: number): WarningLetterItem[] {
  return Array.from({ length: placeholderCount(limit) }, (_, index) => ({
    id: `wl_${index + 1}`,
    title: `FDA Warning Letter ${index + 1}`,
    content: "FDA warning letter regarding compliance issues",
    issued_date: "2025-08-18",
    company: `Company ${index + 1}`,
    violations: ["Quality System", "Documentation"]
  }));
}

/** Placeholder listings until the feed ingestion service exposes real data. */
export function createFeedsRouter(): Router {
  const feedsRouter = Router();

  feedsRouter.get("/rss-feeds/latest", validate({ query: latestQuerySchema }), (_req, res) => {
    const { limit }: LatestQuery = res.locals.query;
    const response: LatestRssFeedsResponse = { feeds: buildRssFeedItems(limit) };
    res.json(response);
  });

  feedsRouter.get("/warning-letters/latest", validate({ query: latestQuerySchema }), (_req, res) => {
    const { limit }: LatestQuery = res.locals.query;
    const response: LatestWarningLettersResponse = {
      warning_letters: buildWarningLetterItems(limit)
    };
    res.json(response);
  });

  return feedsRouter;
}
