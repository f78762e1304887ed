import { getFundMetrics, type MetricsBreakdown } from "@/lib/metrics";
import type { Runtime } from "@/lib/runtime";

import { fail, failFromError, IdSchema, ok, type HandlerResult } from "@/handlers/http";

export async function getMetrics(rt: Runtime, fundId: unknown): Promise<HandlerResult<{ metrics: MetricsBreakdown }>> {
  try {
    const id = IdSchema.parse(fundId);
    const res = await getFundMetrics(rt.store, id, rt.irrOptions);
    if (!res.ok) {
      return res.error.code === "FUND_NOT_FOUND" ? fail("FUND_NOT_FOUND", 404) : fail("INVALID_TRANSACTIONS", 422);
    }
    return ok({ metrics: res.breakdown });
  } catch (err) {
    return failFromError(err, "fund metrics");
  }
}
