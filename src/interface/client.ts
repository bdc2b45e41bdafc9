import {
  DEFAULT_CLIENT_CONFIG,
  type ClientConfig,
  type CollectionFilters,
  type PlayerCountRange,
  type RequestOptions,
  type SearchOptions
} from "@/application/options";
import type { HttpClient } from "@/application/ports/http-client";
import type { Logger } from "@/application/ports/logger";
import { buildCollectionQuery, buildGameFamilyQuery, buildHotListQuery, buildSearchQuery } from "@/application/queries";
import { executePollRequest, type PollContext, type PollRequest } from "@/application/usecases/poll-request";
import { Err, Ok, mapOk, type BggError, type Result } from "@/domain/error";
import type { Collection, GameFamily, HotListEntry, SearchResults } from "@/domain/types";
import { API_ERROR_ROOTS, decodeApiErrors, isApiErrorRoot } from "@/infrastructure/decoders/api-errors";
import { decodeCollection } from "@/infrastructure/decoders/collection";
import type { DecodeOptions } from "@/infrastructure/decoders/fields";
import { decodeGameFamilies } from "@/infrastructure/decoders/game-family";
import { decodeHotList } from "@/infrastructure/decoders/hot-list";
import { decodeSearchResults } from "@/infrastructure/decoders/search";
import { createAxiosHttpClient } from "@/infrastructure/ports/axios-http-client";
import { ConsoleLogger } from "@/infrastructure/logging/console-logger";
import { parseXmlDocument, type XmlElement } from "@/infrastructure/xml/xml-document";
import { validateClientConfig } from "@/shared/config/env-config";

export type BggResult<T> = Promise<Result<T, BggError>>;

/** Every operation resolves with a `Result`; none of them rejects. */
export interface BggClient {
  getCollection(username: string, filters?: CollectionFilters, options?: RequestOptions): BggResult<Collection>;
  getOwned(username: string, options?: RequestOptions): BggResult<Collection>;
  getWishlist(username: string, options?: RequestOptions): BggResult<Collection>;
  /** Keeps items whose player range overlaps `players`; stats are always requested. */
  getCollectionByPlayerCount(
    username: string,
    players: number | PlayerCountRange,
    filters?: CollectionFilters,
    options?: RequestOptions
  ): BggResult<Collection>;
  /** Ordered like `ids`; ids the server does not know are left out. */
  getGameFamilies(ids: Iterable<number>, options?: RequestOptions): BggResult<GameFamily[]>;
  getGameFamily(id: number, options?: RequestOptions): BggResult<GameFamily | null>;
  search(query: string, searchOptions?: SearchOptions, options?: RequestOptions): BggResult<SearchResults>;
  getHotList(options?: RequestOptions): BggResult<HotListEntry[]>;
}

export type BggClientDependencies = {
  readonly httpClient?: HttpClient;
  readonly logger?: Logger;
  readonly now?: () => number;
};

const ITEMS_ROOT = "items";
const PENDING_ROOT = "message";

// 202 を返さずに 200 + <message> で「処理中」を返すことがある
const isPendingBody = (body: Uint8Array): boolean => {
  const document = parseXmlDocument(body, { expectedRoot: PENDING_ROOT });
  return document.ok;
};

const buildHeaders = (config: ClientConfig): Record<string, string> => {
  const headers: Record<string, string> = { Accept: "application/xml" };
  if (config.apiToken !== undefined) {
    headers.Authorization = `Bearer ${config.apiToken}`;
  }
  if (config.userAgent !== undefined) {
    headers["User-Agent"] = config.userAgent;
  }
  return headers;
};

const toPlayerRange = (players: number | PlayerCountRange): PlayerCountRange =>
  typeof players === "number" ? { min: players, max: players } : players;

export function createBggClient(
  clientConfig: ClientConfig = DEFAULT_CLIENT_CONFIG,
  dependencies: BggClientDependencies = {}
): BggClient {
  const config = validateClientConfig(clientConfig);
  const logger = dependencies.logger ?? new ConsoleLogger();
  const context: PollContext = {
    httpClient: dependencies.httpClient ?? createAxiosHttpClient(),
    logger,
    retry: config.retry,
    headers: buildHeaders(config),
    timeoutMs: config.requestTimeoutMs,
    now: dependencies.now
  };
  const decodeOptions: DecodeOptions = { entityMode: config.entityMode };

  const fetchItems = async (request: PollRequest, signal?: AbortSignal): BggResult<XmlElement> => {
    const body = await executePollRequest(request, context, signal);
    if (!body.ok) {
      return body;
    }

    const document = parseXmlDocument(body.value, { expectedRoot: [ITEMS_ROOT, ...API_ERROR_ROOTS] });
    if (!document.ok) {
      logger.warn(`${request.url}: ${document.err.message}`);
      return document;
    }

    const { root } = document.value;
    if (isApiErrorRoot(root)) {
      const apiError = decodeApiErrors(root);
      logger.warn(`${request.url}: ${apiError.message}`);
      return Err(apiError);
    }
    return Ok(root);
  };

  const endpoint = (path: string): string => `${config.baseUrl}/${path}`;

  const getCollection = async (
    username: string,
    filters: CollectionFilters = {},
    options: RequestOptions = {}
  ): BggResult<Collection> => {
    const root = await fetchItems(
      {
        url: endpoint("collection"),
        params: buildCollectionQuery(username, filters),
        asynchronous: true,
        isPending: isPendingBody
      },
      options.signal
    );
    if (!root.ok) {
      return root;
    }
    return decodeCollection(root.value, username, decodeOptions);
  };

  const getCollectionByPlayerCount = async (
    username: string,
    players: number | PlayerCountRange,
    filters: CollectionFilters = {},
    options: RequestOptions = {}
  ): BggResult<Collection> => {
    const { min, max } = toPlayerRange(players);
    const collection = await getCollection(username, { ...filters, stats: true }, options);
    return mapOk(collection, (value) => ({
      ...value,
      items: value.items.filter((item) => {
        const minPlayers = item.stats?.minPlayers;
        const maxPlayers = item.stats?.maxPlayers;
        return minPlayers !== undefined && maxPlayers !== undefined && min <= maxPlayers && max >= minPlayers;
      })
    }));
  };

  const getGameFamilies = async (ids: Iterable<number>, options: RequestOptions = {}): BggResult<GameFamily[]> => {
    const uniqueIds = [...new Set(ids)];
    if (uniqueIds.length === 0) {
      return Ok([]);
    }

    const root = await fetchItems(
      { url: endpoint("family"), params: buildGameFamilyQuery(uniqueIds), asynchronous: false },
      options.signal
    );
    if (!root.ok) {
      return root;
    }

    return mapOk(decodeGameFamilies(root.value, decodeOptions), (families) => {
      const byId = new Map<number, GameFamily>(families.map((family) => [family.id, family]));
      return uniqueIds.flatMap((id) => byId.get(id) ?? []);
    });
  };

  const search = async (
    query: string,
    searchOptions: SearchOptions = {},
    options: RequestOptions = {}
  ): BggResult<SearchResults> => {
    const exact = searchOptions.exact ?? false;
    const root = await fetchItems(
      { url: endpoint("search"), params: buildSearchQuery(query, searchOptions), asynchronous: false },
      options.signal
    );
    if (!root.ok) {
      return root;
    }

    return mapOk(decodeSearchResults(root.value, decodeOptions), (results) => ({
      query,
      exact,
      // BGG の exact 検索は大文字小文字を区別しないので、ここで完全一致に絞る
      results: exact ? results.filter((result) => result.name === query) : results
    }));
  };

  const getHotList = async (options: RequestOptions = {}): BggResult<HotListEntry[]> => {
    const root = await fetchItems(
      { url: endpoint("hot"), params: buildHotListQuery(), asynchronous: false },
      options.signal
    );
    if (!root.ok) {
      return root;
    }
    return decodeHotList(root.value, decodeOptions);
  };

  return {
    getCollection,
    getOwned: (username, options) => getCollection(username, { own: true }, options),
    getWishlist: (username, options) => getCollection(username, { wishlist: true }, options),
    getCollectionByPlayerCount,
    getGameFamilies,
    getGameFamily: async (id, options) =>
      mapOk(await getGameFamilies([id], options), (families) => families[0] ?? null),
    search,
    getHotList
  };
}
