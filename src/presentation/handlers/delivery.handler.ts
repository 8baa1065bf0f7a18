import type { WebhookService } from "../../application/services/webhook.service.js";
import type { Logger } from "../../core/ports/logger.js";
import { type DeliveryId, type OwnerId, brand } from "../../core/types/brand.js";
import type { RequestContext } from "../context.js";
import { errorResponse, jsonResponse } from "./response.js";

/** POST /api/v1/deliveries/:id/cancel */
export const deliveryHandlers = (service: WebhookService, logger: Logger) => ({
  async cancel(_req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const id: DeliveryId = brand<string, "DeliveryId">(ctx.params["id"] ?? "");
    const result = await service.cancelDelivery(accountId, id);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    logger.info("Delivery cancelled", { requestId: ctx.requestId, deliveryId: id, accountId });
    return jsonResponse(result.value);
  },
});
