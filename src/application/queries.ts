import type { CollectionFilters, SearchOptions } from "@/application/options";
import type { HttpRequestParams } from "@/application/ports/http-client";

type QueryParam = readonly [string, string];

const flag = (value: boolean): string => (value ? "1" : "0");

const pushFlag = (params: QueryParam[], key: string, value: boolean | undefined): void => {
  if (value !== undefined) params.push([key, flag(value)]);
};

const pushValue = (params: QueryParam[], key: string, value: string | number | undefined): void => {
  if (value !== undefined) params.push([key, String(value)]);
};

/**
 * @link https://boardgamegeek.com/wiki/page/BGG_XML_API2#toc11
 */
export const buildCollectionQuery = (username: string, filters: CollectionFilters = {}): HttpRequestParams => {
  const params: QueryParam[] = [["username", username]];

  pushFlag(params, "brief", filters.brief);
  pushValue(params, "subtype", filters.itemType);
  pushValue(params, "excludesubtype", filters.excludeItemType);
  pushFlag(params, "own", filters.own);
  pushFlag(params, "prevowned", filters.previouslyOwned);
  pushFlag(params, "trade", filters.forTrade);
  pushFlag(params, "want", filters.wantInTrade);
  pushFlag(params, "wanttoplay", filters.wantToPlay);
  pushFlag(params, "wanttobuy", filters.wantToBuy);
  pushFlag(params, "preordered", filters.preOrdered);
  pushFlag(params, "wishlist", filters.wishlist);
  pushValue(params, "wishlistpriority", filters.wishlistPriority);
  pushValue(params, "modifiedsince", filters.modifiedSince);
  // 省略するとサブタイプ指定時だけ stats が消えるので、常に明示する
  pushFlag(params, "stats", filters.stats ?? true);
  pushFlag(params, "rated", filters.rated);
  pushFlag(params, "played", filters.played);
  pushFlag(params, "comment", filters.commented);
  pushFlag(params, "hasparts", filters.hasParts);
  pushFlag(params, "wantparts", filters.wantParts);
  pushValue(params, "minrating", filters.minRating);
  pushValue(params, "rating", filters.maxRating);
  pushValue(params, "minbggrating", filters.minBggRating);
  pushValue(params, "bggrating", filters.maxBggRating);
  pushValue(params, "minplays", filters.minPlays);
  pushValue(params, "maxplays", filters.maxPlays);
  pushFlag(params, "showprivate", filters.showPrivate);
  pushValue(params, "collid", filters.collectionId);

  return params;
};

/** Only board game families are exposed; the endpoint also serves RPG and video game families. */
export const buildGameFamilyQuery = (ids: readonly number[]): HttpRequestParams => [
  ["type", "boardgamefamily"],
  ["id", ids.join(",")]
];

const DEFAULT_SEARCH_TYPES = "boardgame,boardgameexpansion";

export const buildSearchQuery = (query: string, options: SearchOptions = {}): HttpRequestParams => {
  const params: QueryParam[] = [["query", query]];

  pushValue(params, "type", options.itemType ?? DEFAULT_SEARCH_TYPES);
  pushFlag(params, "exact", options.exact);

  return params;
};

export const buildHotListQuery = (): HttpRequestParams => [["type", "boardgame"]];
