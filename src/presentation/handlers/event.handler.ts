/**
 * Producer API.
 *
 * POST /api/v1/events: publish a business event to every subscribed endpoint
 */

import { publishEventDto } from "../../application/dtos/webhook.dto.js";
import type { WebhookService } from "../../application/services/webhook.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { OwnerId } from "../../core/types/brand.js";
import type { RequestContext } from "../context.js";
import { parseJson, validateBody } from "../middleware/validate.js";
import { createdResponse, errorResponse } from "./response.js";

export const eventHandlers = (service: WebhookService, logger: Logger) => ({
  async publish(req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const json = parseJson(await req.text());
    if (!json.ok) return errorResponse(json.error, ctx.requestId);

    const input = validateBody(publishEventDto, json.value);
    if (!input.ok) return errorResponse(input.error, ctx.requestId);

    const result = await service.publish(accountId, input.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    logger.debug("Event published", {
      requestId: ctx.requestId,
      eventId: result.value.id,
      deliveries: result.value.deliveries,
    });
    return createdResponse(result.value);
  },
});
