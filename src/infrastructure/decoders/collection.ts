import { DecodeError, type Result } from "@/domain/error";
import {
  isWishlistPriority,
  type Collection,
  type CollectionItem,
  type CollectionItemStats,
  type CollectionItemStatus,
  type RankEntry,
  type WishlistPriority
} from "@/domain/types";
import {
  correct,
  correctOptional,
  decodeWith,
  optionalAttribute,
  optionalChildInteger,
  optionalChildText,
  optionalDecimalAttribute,
  optionalIntegerAttribute,
  parseDecimal,
  requireAttribute,
  requireChild,
  requireFlagAttribute,
  requireIntegerAttribute,
  requireItemType,
  requirePositiveId,
  type DecodeOptions
} from "@/infrastructure/decoders/fields";
import type { XmlElement } from "@/infrastructure/xml/xml-document";

const NOT_AVAILABLE = "N/A";
const NOT_RANKED = "Not Ranked";

// 例: lastmodified="2024-04-13 18:29:01" (タイムゾーン表記なし、UTCとして扱う)
const LAST_MODIFIED = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const readLastModified = (status: XmlElement): Date | undefined => {
  const raw = optionalAttribute(status, "lastmodified");
  if (raw === undefined) return undefined;

  const match = LAST_MODIFIED.exec(raw);
  if (match === null) {
    throw DecodeError.unexpectedValue("lastmodified", status.name, raw);
  }
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (Number.isNaN(date.getTime())) {
    throw DecodeError.unexpectedValue("lastmodified", status.name, raw);
  }
  return date;
};

const readWishlistPriority = (status: XmlElement): WishlistPriority | undefined => {
  const priority = optionalIntegerAttribute(status, "wishlistpriority");
  if (priority === undefined) return undefined;
  if (!isWishlistPriority(priority)) {
    throw DecodeError.unexpectedValue("wishlistpriority", status.name, String(priority));
  }
  return priority;
};

const readStatus = (status: XmlElement): CollectionItemStatus => {
  const wishlist = requireFlagAttribute(status, "wishlist");
  return {
    own: requireFlagAttribute(status, "own"),
    previouslyOwned: requireFlagAttribute(status, "prevowned"),
    forTrade: requireFlagAttribute(status, "fortrade"),
    wantInTrade: requireFlagAttribute(status, "want"),
    wantToPlay: requireFlagAttribute(status, "wanttoplay"),
    wantToBuy: requireFlagAttribute(status, "wanttobuy"),
    wishlist,
    preOrdered: requireFlagAttribute(status, "preordered"),
    // BGG は wishlist="0" でも古い優先度を返すことがある
    wishlistPriority: wishlist ? readWishlistPriority(status) : undefined,
    lastModified: readLastModified(status)
  };
};

/** `"Not Ranked"` and `"N/A"` both mean there is no value. */
const readRankNumber = (raw: string | undefined, field: string, element: string): number | null => {
  if (raw === undefined || raw === NOT_RANKED || raw === NOT_AVAILABLE) return null;
  return parseDecimal(raw, field, element);
};

const readRank = (rank: XmlElement): RankEntry => ({
  type: requireAttribute(rank, "type"),
  id: requireIntegerAttribute(rank, "id"),
  name: requireAttribute(rank, "name"),
  friendlyName: requireAttribute(rank, "friendlyname"),
  value: readRankNumber(optionalAttribute(rank, "value"), "value", rank.name),
  bayesianAverage: readRankNumber(optionalAttribute(rank, "bayesaverage"), "bayesaverage", rank.name) ?? undefined
});

const readValueChild = (parent: XmlElement | undefined, tag: string): number | undefined => {
  const child = parent?.child(tag);
  if (child === undefined) return undefined;
  return readRankNumber(optionalAttribute(child, "value"), tag, child.name) ?? undefined;
};

const readStats = (stats: XmlElement): CollectionItemStats => {
  const rating = stats.child("rating");
  const ranks = rating?.child("ranks")?.children("rank") ?? [];
  return {
    minPlayers: optionalIntegerAttribute(stats, "minplayers"),
    maxPlayers: optionalIntegerAttribute(stats, "maxplayers"),
    minPlaytime: optionalIntegerAttribute(stats, "minplaytime"),
    maxPlaytime: optionalIntegerAttribute(stats, "maxplaytime"),
    playingTime: optionalIntegerAttribute(stats, "playingtime"),
    ownedBy: optionalIntegerAttribute(stats, "numowned"),
    usersRated: readValueChild(rating, "usersrated"),
    average: readValueChild(rating, "average"),
    bayesianAverage: readValueChild(rating, "bayesaverage"),
    ranks: ranks.map(readRank)
  };
};

const readUserRating = (stats: XmlElement | undefined): number | undefined => {
  const rating = stats?.child("rating");
  if (rating === undefined) return undefined;
  const raw = optionalAttribute(rating, "value");
  if (raw === undefined || raw === NOT_AVAILABLE) return undefined;
  return optionalDecimalAttribute(rating, "value");
};

const readItem = (item: XmlElement, options: DecodeOptions): CollectionItem => {
  const stats = item.child("stats");
  return {
    id: requirePositiveId(item, "objectid"),
    collectionId: requireIntegerAttribute(item, "collid"),
    itemType: requireItemType(item, "subtype"),
    name: correct(requireChild(item, "name").text(), options),
    yearPublished: optionalChildInteger(item, "yearpublished"),
    image: optionalChildText(item, "image"),
    thumbnail: optionalChildText(item, "thumbnail"),
    status: readStatus(requireChild(item, "status")),
    numberOfPlays: optionalChildInteger(item, "numplays") ?? 0,
    rating: readUserRating(stats),
    comment: correctOptional(optionalChildText(item, "comment"), options),
    stats: stats === undefined ? undefined : readStats(stats)
  };
};

export const decodeCollection = (
  root: XmlElement,
  username: string,
  options: DecodeOptions
): Result<Collection, DecodeError> =>
  decodeWith(() => ({
    username,
    totalItems: optionalIntegerAttribute(root, "totalitems"),
    publishedAt: optionalAttribute(root, "pubdate"),
    items: root.children("item").map((item) => readItem(item, options))
  }));
