/**
 * GetFeedTreeUsecase - fetches and decodes the category/feed hierarchy
 */

import type { RpcChannel } from "../port/rpc_channel.ts";
import { ApiStatus } from "../domain/types.ts";
import { ApiError } from "../domain/errors.ts";
import { decodeFeedTree, type FeedTreeNode } from "../domain/feed_tree.ts";

export class GetFeedTreeUsecase {
  constructor(private channel: RpcChannel) {}

  async execute(includeEmptyCategories = false): Promise<FeedTreeNode> {
    const resp = await this.channel.call("getFeedTree", {
      include_empty: includeEmptyCategories,
    });

    if (resp.status !== ApiStatus.OK) {
      throw new ApiError(
        `failed to get feed tree: API returned status ${resp.status}: ${resp.error}`,
        resp.status,
        resp.error,
      );
    }

    return decodeFeedTree(resp.content);
  }
}
