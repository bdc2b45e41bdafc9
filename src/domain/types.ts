/**
 * Value objects returned by the client.
 * Every sequence keeps the order of the server response.
 */

export const ITEM_TYPES = ["boardgame", "boardgameexpansion"] as const;

/**
 * `boardgame` also covers expansions unless they are explicitly excluded:
 * the API reports every item as `boardgame` when expansions are not filtered out.
 */
export type ItemType = (typeof ITEM_TYPES)[number];

export const isItemType = (value: string): value is ItemType => ITEM_TYPES.some((type) => type === value);

/** BGG numbers wishlist priorities from 1 (must have) to 5 (don't buy this). */
export const WishlistPriority = {
  MustHave: 1,
  LoveToHave: 2,
  LikeToHave: 3,
  ThinkingAboutIt: 4,
  DontBuyThis: 5
} as const;

export type WishlistPriority = (typeof WishlistPriority)[keyof typeof WishlistPriority];

export const isWishlistPriority = (value: number): value is WishlistPriority =>
  Object.values(WishlistPriority).some((priority) => priority === value);

export type GameReference = {
  readonly id: number;
  readonly name: string;
};

export type CollectionItemStatus = {
  readonly own: boolean;
  readonly previouslyOwned: boolean;
  readonly forTrade: boolean;
  readonly wantInTrade: boolean;
  readonly wantToPlay: boolean;
  readonly wantToBuy: boolean;
  readonly wishlist: boolean;
  readonly preOrdered: boolean;
  readonly wishlistPriority?: WishlistPriority;
  readonly lastModified?: Date;
};

export type RankEntry = {
  readonly type: string;
  readonly id: number;
  readonly name: string;
  readonly friendlyName: string;
  /** `null` when BGG reports "Not Ranked". */
  readonly value: number | null;
  readonly bayesianAverage?: number;
};

/** Playing times are in minutes. */
export type CollectionItemStats = {
  readonly minPlayers?: number;
  readonly maxPlayers?: number;
  readonly minPlaytime?: number;
  readonly maxPlaytime?: number;
  readonly playingTime?: number;
  readonly ownedBy?: number;
  readonly usersRated?: number;
  readonly average?: number;
  readonly bayesianAverage?: number;
  readonly ranks: readonly RankEntry[];
};

export type CollectionItem = {
  readonly id: number;
  readonly collectionId: number;
  readonly itemType: ItemType;
  readonly name: string;
  readonly yearPublished?: number;
  readonly image?: string;
  readonly thumbnail?: string;
  readonly status: CollectionItemStatus;
  readonly numberOfPlays: number;
  /** The user's own 0-10 rating, absent when unrated. */
  readonly rating?: number;
  readonly comment?: string;
  readonly stats?: CollectionItemStats;
};

export type Collection = {
  readonly username: string;
  readonly totalItems?: number;
  readonly publishedAt?: string;
  readonly items: readonly CollectionItem[];
};

export type GameFamily = {
  readonly id: number;
  readonly name: string;
  readonly alternateNames: readonly string[];
  readonly image?: string;
  readonly thumbnail?: string;
  readonly description?: string;
  readonly games: readonly GameReference[];
};

export type SearchResult = {
  readonly id: number;
  readonly itemType: ItemType;
  readonly name: string;
  readonly yearPublished?: number;
};

export type SearchResults = {
  readonly query: string;
  readonly exact: boolean;
  readonly results: readonly SearchResult[];
};

export const HOT_LIST_MAX_RANK = 10;

export type HotListEntry = {
  readonly rank: number;
  readonly id: number;
  readonly name: string;
  readonly thumbnail?: string;
  readonly yearPublished?: number;
};
