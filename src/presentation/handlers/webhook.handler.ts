/**
 * Endpoint management API: every route is scoped to the calling account.
 *
 * POST   /api/v1/webhooks                      create (secret returned once)
 * GET    /api/v1/webhooks                      list
 * GET    /api/v1/webhooks/:id                  get
 * PATCH  /api/v1/webhooks/:id                  update
 * DELETE /api/v1/webhooks/:id                  delete, cancelling queued deliveries
 * POST   /api/v1/webhooks/:id/rotate-secret    new secret, returned once
 * GET    /api/v1/webhooks/:id/deliveries       delivery log
 */

import {
  createEndpointDto,
  listDeliveriesQuery,
  updateEndpointDto,
} from "../../application/dtos/webhook.dto.js";
import type { WebhookService } from "../../application/services/webhook.service.js";
import type { Logger } from "../../core/ports/logger.js";
import { type EndpointId, type OwnerId, brand } from "../../core/types/brand.js";
import type { RequestContext } from "../context.js";
import { parseJson, queryParams, validateBody } from "../middleware/validate.js";
import { createdResponse, errorResponse, jsonResponse, noContentResponse } from "./response.js";

const endpointId = (ctx: RequestContext): EndpointId => brand<string, "EndpointId">(ctx.params["id"] ?? "");

export const webhookHandlers = (service: WebhookService, logger: Logger) => ({
  async create(req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const json = parseJson(await req.text());
    if (!json.ok) return errorResponse(json.error, ctx.requestId);

    const input = validateBody(createEndpointDto, json.value);
    if (!input.ok) return errorResponse(input.error, ctx.requestId);

    const result = await service.createEndpoint(accountId, input.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    logger.info("Webhook endpoint created", {
      requestId: ctx.requestId,
      endpointId: result.value.endpoint.id,
      accountId,
    });
    return createdResponse(result.value, `/api/v1/webhooks/${result.value.endpoint.id}`);
  },

  async list(_req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const result = await service.listEndpoints(accountId);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse({ endpoints: result.value });
  },

  async get(_req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const result = await service.getEndpoint(accountId, endpointId(ctx));
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse(result.value);
  },

  async update(req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const json = parseJson(await req.text());
    if (!json.ok) return errorResponse(json.error, ctx.requestId);

    const input = validateBody(updateEndpointDto, json.value);
    if (!input.ok) return errorResponse(input.error, ctx.requestId);

    const result = await service.updateEndpoint(accountId, endpointId(ctx), input.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse(result.value);
  },

  async remove(_req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const id = endpointId(ctx);
    const result = await service.deleteEndpoint(accountId, id);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    logger.info("Webhook endpoint deleted", { requestId: ctx.requestId, endpointId: id, accountId });
    return noContentResponse();
  },

  async rotateSecret(_req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const result = await service.rotateSecret(accountId, endpointId(ctx));
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse(result.value);
  },

  async listDeliveries(req: Request, ctx: RequestContext, accountId: OwnerId): Promise<Response> {
    const query = validateBody(listDeliveriesQuery, queryParams(req));
    if (!query.ok) return errorResponse(query.error, ctx.requestId);

    const result = await service.listDeliveries(accountId, endpointId(ctx), query.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);
    return jsonResponse(result.value);
  },
});
