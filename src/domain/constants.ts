/**
 * Well-known identifiers reserved by the server.
 */

export const CategoryId = {
  UNCATEGORIZED: 0,
  SPECIAL: -1,
  LABELS: -2,
  FEEDS_NOT_VIRTUAL: -3,
  FEEDS_ALL: -4,
} as const;

// Plugin feeds count down from PLUGIN_FEED_BASE_INDEX and label feeds from
// LABEL_BASE_INDEX; both bases are server-side settings.
export const FeedId = {
  ARCHIVED_ARTICLES: 0,
  STARRED_ARTICLES: -1,
  PUBLISHED_ARTICLES: -2,
  FRESH_ARTICLES: -3,
  ALL_ARTICLES: -4,
  RECENTLY_READ: -6,
} as const;

export const PLUGIN_FEED_BASE_INDEX = -128;
export const LABEL_BASE_INDEX = -1024;

