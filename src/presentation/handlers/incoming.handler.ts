/**
 * Inbound webhooks and their operator views.
 *
 * POST /webhooks/incoming/:source                           verify, dedup, ack
 * GET  /api/v1/incoming-events                               list
 * POST /api/v1/incoming-events/:source/:eventId/retry        re-run an `error` event
 */

import { listIncomingEventsQuery } from "../../application/dtos/webhook.dto.js";
import type { IncomingWebhookService } from "../../application/services/incoming-webhook.service.js";
import type { RequestContext } from "../context.js";
import { queryParams, validateBody } from "../middleware/validate.js";
import { errorResponse, jsonResponse } from "./response.js";

export const incomingHandlers = (service: IncomingWebhookService) => ({
  async receive(req: Request, ctx: RequestContext): Promise<Response> {
    const rawBody = await req.text();
    const result = await service.receive(ctx.params["source"] ?? "", rawBody, (name) =>
      req.headers.get(name) ?? undefined,
    );
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse({ received: true, ...result.value });
  },

  async list(req: Request, ctx: RequestContext): Promise<Response> {
    const query = validateBody(listIncomingEventsQuery, queryParams(req));
    if (!query.ok) return errorResponse(query.error, ctx.requestId);

    const result = await service.list(query.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse(result.value);
  },

  async retry(_req: Request, ctx: RequestContext): Promise<Response> {
    const result = await service.retry(ctx.params["source"] ?? "", ctx.params["eventId"] ?? "");
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse(result.value);
  },
});
