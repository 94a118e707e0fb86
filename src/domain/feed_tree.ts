/**
 * Feed tree model, decoder and traversal
 */

import * as v from "valibot";
import type { JsonObject } from "./types.ts";
import { ProtocolError, WalkError } from "./errors.ts";
import { describeIssues } from "./issues.ts";

export type FeedTreeKind = "category" | "feed";

export interface FeedTreeNode {
  readonly id: number;
  /** "/" for the synthetic root. */
  readonly name: string;
  readonly kind: FeedTreeKind;
  /** Feeds only; empty when the last update succeeded. */
  readonly lastError: string;
  /** Categories only; always empty for feeds. */
  readonly children: readonly FeedTreeNode[];
}

export const FEED_TREE_ROOT_ID = 0;
export const FEED_TREE_ROOT_NAME = "/";

interface WireTreeItem {
  bare_ID?: number;
  bare_id?: number;
  name: string;
  type: FeedTreeKind;
  error?: string | null;
  items?: unknown[];
}

const IdSchema = v.pipe(v.number(), v.integer());

const WireTreeItemSchema: v.GenericSchema<WireTreeItem> = v.object({
  bare_ID: v.optional(IdSchema),
  bare_id: v.optional(IdSchema),
  name: v.string(),
  type: v.picklist(["category", "feed"]),
  error: v.nullish(v.string()),
  items: v.optional(v.array(v.unknown())),
});

function decodeItem(raw: unknown, path: string): FeedTreeNode {
  const parsed = v.safeParse(WireTreeItemSchema, raw);
  if (!parsed.success) {
    throw new ProtocolError(
      `getFeedTree: invalid item at ${path}: ${describeIssues(parsed.issues)}`,
    );
  }

  const item = parsed.output;
  const id = item.bare_ID ?? item.bare_id;
  if (id === undefined) {
    throw new ProtocolError(`getFeedTree: item at ${path} has no bare_ID`);
  }

  if (item.type === "feed") {
    return Object.freeze({
      id,
      name: item.name,
      kind: "feed",
      lastError: item.error ?? "",
      children: Object.freeze([]),
    });
  }

  return Object.freeze({
    id,
    name: item.name,
    kind: "category",
    lastError: "",
    children: decodeItems(item.items ?? [], `${path}.items`),
  });
}

function decodeItems(
  items: readonly unknown[],
  path: string,
): readonly FeedTreeNode[] {
  return Object.freeze(
    items.map((item, index) => decodeItem(item, `${path}[${index}]`)),
  );
}

/**
 * Builds the tree from a getFeedTree content mapping. The returned root is
 * synthetic: the server's top-level wrapper is not itself an item.
 */
export function decodeFeedTree(content: Readonly<JsonObject>): FeedTreeNode {
  if (!("categories" in content)) {
    throw new ProtocolError("getFeedTree: content lacks categories key");
  }

  const categories = content["categories"];
  if (
    typeof categories !== "object" || categories === null ||
    Array.isArray(categories)
  ) {
    throw new ProtocolError(
      `getFeedTree: categories is not a JSON object: ${
        JSON.stringify(categories)
      }`,
    );
  }

  if (!("items" in categories)) {
    throw new ProtocolError("getFeedTree: categories has no items entry");
  }

  const items: unknown = categories.items;
  if (!Array.isArray(items)) {
    throw new ProtocolError(
      `getFeedTree: items is not a JSON array: ${typeof items}`,
    );
  }

  return Object.freeze({
    id: FEED_TREE_ROOT_ID,
    name: FEED_TREE_ROOT_NAME,
    kind: "category",
    lastError: "",
    children: decodeItems(items, "categories.items"),
  });
}

export type WalkDecision =
  | { readonly action: "continue" }
  | { readonly action: "skip-subtree" }
  | { readonly action: "abort"; readonly error: Error };

export const CONTINUE: WalkDecision = Object.freeze({ action: "continue" });

/** Only valid for categories; returning it for a feed aborts the walk. */
export const SKIP_SUBTREE: WalkDecision = Object.freeze({
  action: "skip-subtree",
});

export function abort(error: Error): WalkDecision {
  return { action: "abort", error };
}

export type FeedTreeVisitor = (node: FeedTreeNode) => WalkDecision;

function skipOnFeed(node: FeedTreeNode): WalkError {
  return new WalkError(
    `cannot skip the subtree of feed ${node.id} (${node.name}): feeds have no children`,
  );
}

function walkChildren(
  category: FeedTreeNode,
  visit: FeedTreeVisitor,
): Error | null {
  for (const child of category.children) {
    const decision = visit(child);

    if (child.kind === "feed") {
      switch (decision.action) {
        case "continue":
          continue;
        case "skip-subtree":
          return skipOnFeed(child);
        case "abort":
          return decision.error;
      }
    }

    switch (decision.action) {
      case "skip-subtree":
        continue;
      case "abort":
        return decision.error;
      case "continue": {
        const err = walkChildren(child, visit);
        if (err) {
          return err;
        }
      }
    }
  }
  return null;
}

/**
 * Depth-first, pre-order walk. Every node is visited at most once; the
 * first aborting error is returned, or null once the walk completes.
 */
export function walkFeedTree(
  root: FeedTreeNode,
  visit: FeedTreeVisitor,
): Error | null {
  const decision = visit(root);

  switch (decision.action) {
    case "abort":
      return decision.error;
    case "skip-subtree":
      return root.kind === "feed" ? skipOnFeed(root) : null;
    case "continue":
      return root.kind === "feed" ? null : walkChildren(root, visit);
  }
}
