import { describe, expect, it } from "vitest";
import { SubscribeUsecase } from "../../../src/usecase/subscribe.ts";
import { ApiStatus } from "../../../src/domain/types.ts";
import { ApiError, ProtocolError } from "../../../src/domain/errors.ts";
import { CategoryId } from "../../../src/domain/constants.ts";
import { SubscribeStatus } from "../../../src/domain/subscription.ts";
import { envelope, FakeRpcChannel } from "../../fakes/rpc_channel_fake.ts";

describe("SubscribeUsecase", () => {
  it("should send the feed url and category", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ status: { code: 1 } }),
    );

    await new SubscribeUsecase(channel).execute({
      feedUrl: "http://feeds.test/rss",
      categoryId: 4,
    });

    expect(channel.calls[0]?.operation).toBe("subscribeToFeed");
    expect(channel.calls[0]?.parameters).toEqual({
      feed_url: "http://feeds.test/rss",
      category_id: 4,
    });
  });

  it("should file the feed as uncategorized by default", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ status: { code: 1 } }),
    );

    await new SubscribeUsecase(channel).execute({
      feedUrl: "http://feeds.test/rss",
    });

    expect(channel.calls[0]?.parameters).toEqual({
      feed_url: "http://feeds.test/rss",
      category_id: CategoryId.UNCATEGORIZED,
    });
  });

  it("should send feed credentials only with a feed user", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ status: { code: 1 } }),
      envelope({ status: { code: 1 } }),
    );
    const usecase = new SubscribeUsecase(channel);

    await usecase.execute({
      feedUrl: "http://feeds.test/private",
      categoryId: 0,
      feedUser: "feeduser",
      feedPassword: "test-secret",
    });
    await usecase.execute({
      feedUrl: "http://feeds.test/public",
      categoryId: 0,
      feedUser: "",
      feedPassword: "ignored",
    });

    expect(channel.calls[0]?.parameters).toEqual({
      feed_url: "http://feeds.test/private",
      category_id: 0,
      login: "feeduser",
      password: "test-secret",
    });
    expect(channel.calls[1]?.parameters).toEqual({
      feed_url: "http://feeds.test/public",
      category_id: 0,
    });
  });

  it("should decode the nested subscription status", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ status: { code: 0, message: "already there" } }),
    );

    const result = await new SubscribeUsecase(channel).execute({
      feedUrl: "http://feeds.test/rss",
      categoryId: 0,
    });

    expect(result.subscribed).toBe(true);
    expect(result.outcome.code).toBe(SubscribeStatus.ALREADY_SUBSCRIBED);
    expect(result.outcome.message).toBe(
      "already subscribed to feed: already there",
    );
  });

  it("should report a failed fetch as not subscribed", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ status: { code: 3 } }),
    );

    const result = await new SubscribeUsecase(channel).execute({
      feedUrl: "http://feeds.test/page.html",
      categoryId: 0,
    });

    expect(result.subscribed).toBe(false);
    expect(result.outcome.code).toBe(SubscribeStatus.HTML_NO_FEEDS);
  });

  it("should raise the envelope's application error", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ error: "NOT_LOGGED_IN" }, ApiStatus.ERROR),
    );

    await expect(
      new SubscribeUsecase(channel).execute({
        feedUrl: "http://feeds.test/rss",
        categoryId: 0,
      }),
    ).rejects.toThrow(new ApiError("API error: NOT_LOGGED_IN", 1, "NOT_LOGGED_IN"));
  });

  it("should reject an unknown code", async () => {
    const channel = new FakeRpcChannel().reply(
      envelope({ status: { code: 99 } }),
    );

    await expect(
      new SubscribeUsecase(channel).execute({
        feedUrl: "http://feeds.test/rss",
        categoryId: 0,
      }),
    ).rejects.toThrow(ProtocolError);
  });
});
