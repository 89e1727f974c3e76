// backend/services/timetracker/src/controllers/timeEntries.ts
import type { RequestHandler } from "express";
import { z } from "zod";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { requestIdOf } from "@shared/middleware/requestId";
import { sendProblem } from "@shared/http/errors";
import { respond } from "@shared/http/respond";
import { logger } from "@shared/logger/logger";
import type { ProblemFactory } from "@shared/problem/problem";
import type { StoreProvider } from "../store/RecordStore";
import { zMonthParams } from "../validators/timeEntry.dto";
import { zTimeEntryView } from "../contracts/views";
import { entriesForMonth } from "../services/timeEntries";

const zMonthView = z.array(zTimeEntryView);

/** GET /time-entries/user/:userId/:year/:month, unpaginated, ordered by entryDate. */
export function makeMonthHandler(
  provider: StoreProvider,
  problems: ProblemFactory
): RequestHandler {
  return asyncHandler(async (req, res) => {
    const parsed = zMonthParams.safeParse(req.params);
    if (!parsed.success) {
      sendProblem(res, problems.fromZod(parsed.error, requestIdOf(req)));
      return;
    }
    logger.debug({ ...parsed.data }, "timeEntries.forMonth: enter");
    const entries = await entriesForMonth(provider, parsed.data);
    logger.debug({ count: entries.length }, "timeEntries.forMonth: exit");
    respond(res, zMonthView, entries);
  });
}
