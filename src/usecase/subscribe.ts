/**
 * SubscribeUsecase - subscribeToFeed and its nested status object
 */

import type { RpcChannel } from "../port/rpc_channel.ts";
import type { JsonObject, SubscribeRequest } from "../domain/types.ts";
import { ApiError } from "../domain/errors.ts";
import { CategoryId } from "../domain/constants.ts";
import { decodeSubscribe, type SubscribeResult } from "../domain/subscription.ts";
import { logger } from "../infra/logger.ts";

export class SubscribeUsecase {
  constructor(private channel: RpcChannel) {}

  // An authenticated call naming a feed URL always "succeeds"; the real
  // result is the code inside content.status.
  async execute(request: SubscribeRequest): Promise<SubscribeResult> {
    const categoryId = request.categoryId ?? CategoryId.UNCATEGORIZED;
    const params: JsonObject = {
      feed_url: request.feedUrl,
      category_id: categoryId,
    };
    if (request.feedUser) {
      params["login"] = request.feedUser;
      params["password"] = request.feedPassword ?? "";
    }

    const resp = await this.channel.call("subscribeToFeed", params);
    if (resp.error !== null) {
      throw new ApiError(`API error: ${resp.error}`, resp.status, resp.error);
    }

    const result = decodeSubscribe(resp.content);
    logger.info("Subscription attempt finished", {
      feed_url: request.feedUrl,
      category_id: categoryId,
      code: result.outcome.code,
      subscribed: result.subscribed,
    });
    return result;
  }
}
