import type { EntityMode } from "@/domain/services/text-correction";
import type { ItemType, WishlistPriority } from "@/domain/types";

export type RetryPolicy = {
  /** Total number of requests, the first one included. */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffFactor: number;
  readonly maxDelayMs: number;
};

export type ClientConfig = {
  readonly baseUrl: string;
  readonly retry: RetryPolicy;
  readonly requestTimeoutMs?: number;
  readonly entityMode: EntityMode;
  /** Sent as a bearer token; BGG rejects anonymous XML API traffic from registered-only applications. */
  readonly apiToken?: string;
  readonly userAgent?: string;
};

export const DEFAULT_BASE_URL = "https://boardgamegeek.com/xmlapi2";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 6,
  initialDelayMs: 2000,
  backoffFactor: 1.5,
  maxDelayMs: 30000
};

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  baseUrl: DEFAULT_BASE_URL,
  retry: DEFAULT_RETRY_POLICY,
  entityMode: "repair"
};

export type RequestOptions = {
  readonly signal?: AbortSignal;
};

/**
 * Leaving a status flag unset lets the server decide. Once any status flag is `true`,
 * BGG returns only items matching at least one of the flags set to `true`.
 */
export type CollectionFilters = {
  /** Brief responses omit year, images, plays and most stats. */
  readonly brief?: boolean;
  readonly itemType?: ItemType;
  readonly excludeItemType?: ItemType;
  readonly own?: boolean;
  readonly previouslyOwned?: boolean;
  readonly forTrade?: boolean;
  readonly wantInTrade?: boolean;
  readonly wantToPlay?: boolean;
  readonly wantToBuy?: boolean;
  readonly preOrdered?: boolean;
  readonly wishlist?: boolean;
  readonly wishlistPriority?: WishlistPriority;
  /** `YYYY-MM-DD` */
  readonly modifiedSince?: string;
  /** Sent as `stats=1` when left unset: BGG drops stats inconsistently otherwise. */
  readonly stats?: boolean;
  readonly rated?: boolean;
  readonly played?: boolean;
  readonly commented?: boolean;
  readonly hasParts?: boolean;
  readonly wantParts?: boolean;
  readonly minRating?: number;
  readonly maxRating?: number;
  readonly minBggRating?: number;
  readonly maxBggRating?: number;
  readonly minPlays?: number;
  readonly maxPlays?: number;
  readonly showPrivate?: boolean;
  readonly collectionId?: number;
};

export type SearchOptions = {
  readonly exact?: boolean;
  readonly itemType?: ItemType;
};

export type PlayerCountRange = {
  readonly min: number;
  readonly max: number;
};
