import { describe, it, expect } from "vitest";

import { DEFAULT_CLIENT_CONFIG, type ClientConfig } from "../../src/application/options";
import { createBggClient } from "../../src/interface/client";
import { createFakeHttpClient, createTestLogger, type FakeReply } from "../helpers/fakes";
import { readFixture } from "../helpers/fixtures";

const BASE_URL = "https://bgg.test/xmlapi2";

const config: ClientConfig = {
  ...DEFAULT_CLIENT_CONFIG,
  baseUrl: BASE_URL,
  retry: { maxAttempts: 3, initialDelayMs: 0, backoffFactor: 1, maxDelayMs: 0 },
  apiToken: "test-secret"
};

const setup = (replies: FakeReply[], overrides: Partial<ClientConfig> = {}) => {
  const { client: httpClient, get } = createFakeHttpClient(replies);
  const logger = createTestLogger();
  const client = createBggClient({ ...config, ...overrides }, { httpClient, logger });
  return { client, get, logger };
};

const ok = (fixture: string): FakeReply => ({ status: 200, body: readFixture(fixture) });

describe("createBggClient", () => {
  describe("getCollection", () => {
    it("処理中の応答を待ってからコレクションを返す", async () => {
      const { client, get } = setup([{ status: 202 }, ok("collection-pending.xml"), ok("collection.xml")]);

      const result = await client.getCollection("alice");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.items.map((item) => item.name)).toEqual([
        "Glück im Garten",
        "Harbour Tiles",
        "The Lantern Market"
      ]);
      expect(get).toHaveBeenCalledTimes(3);
      expect(get).toHaveBeenLastCalledWith(`${BASE_URL}/collection`, {
        params: [
          ["username", "alice"],
          ["stats", "1"]
        ],
        headers: { Accept: "application/xml", Authorization: "Bearer test-secret" },
        signal: undefined,
        timeoutMs: undefined
      });
    });

    it("空のコレクションは処理中と区別して空で返す", async () => {
      const { client } = setup([ok("collection-empty.xml")]);

      const result = await client.getCollection("bob");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({
        username: "bob",
        totalItems: 0,
        publishedAt: "Sat, 13 Apr 2024 18:30:00 +0000",
        items: []
      });
    });

    it("<errors> 本文は ApiResponseError", async () => {
      const { client, logger } = setup([ok("errors-invalid-username.xml")]);

      const result = await client.getCollection("nobody");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.err.kind).toBe("api");
      if (result.err.kind !== "api") return;
      expect(result.err.reason).toBe("unknown-username");
      expect(logger.warn).toHaveBeenCalledWith(
        `${BASE_URL}/collection: API Error: Invalid username specified`
      );
    });

    it("処理中のまま試行回数を使い切ると TimeoutError", async () => {
      const { client, get } = setup([{ status: 202 }]);

      const result = await client.getCollection("alice");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.err.kind).toBe("timeout");
      expect(get).toHaveBeenCalledTimes(3);
    });

    it("壊れた XML は ParseError", async () => {
      const { client } = setup([{ status: 200, body: "<items><item></items>" }]);

      const result = await client.getCollection("alice");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.err.kind).toBe("parse");
    });

    it("preserve モードを設定できる", async () => {
      const { client } = setup([ok("collection.xml")], { entityMode: "preserve" });

      const result = await client.getCollection("alice");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.items[0].name).toBe("GlÃ¼ck im Garten");
    });
  });

  it("getOwned は own=1 を送る", async () => {
    const { client, get } = setup([ok("collection.xml")]);

    await client.getOwned("alice");

    expect(get.mock.calls[0][1]?.params).toEqual([
      ["username", "alice"],
      ["own", "1"],
      ["stats", "1"]
    ]);
  });

  it("getWishlist は wishlist=1 を送る", async () => {
    const { client, get } = setup([ok("collection.xml")]);

    await client.getWishlist("alice");

    expect(get.mock.calls[0][1]?.params).toEqual([
      ["username", "alice"],
      ["wishlist", "1"],
      ["stats", "1"]
    ]);
  });

  describe("getCollectionByPlayerCount", () => {
    it("プレイ人数の範囲が重なるアイテムだけを残す", async () => {
      const { client } = setup([ok("collection.xml")]);

      const result = await client.getCollectionByPlayerCount("alice", 3);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.items.map((item) => item.id)).toEqual([1001]);
    });

    it("範囲指定もできる", async () => {
      const { client, get } = setup([ok("collection.xml")]);

      const result = await client.getCollectionByPlayerCount("alice", { min: 1, max: 1 }, { stats: false });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.items.map((item) => item.id)).toEqual([1002]);
      expect(get.mock.calls[0][1]?.params).toContainEqual(["stats", "1"]);
    });
  });

  describe("getGameFamilies", () => {
    it("重複を除いた ID を一度に問い合わせ、入力順に並べる", async () => {
      const { client, get } = setup([ok("family.xml")]);

      const result = await client.getGameFamilies([20, 10, 20]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((family) => family.id)).toEqual([20, 10]);
      expect(get).toHaveBeenCalledTimes(1);
      expect(get.mock.calls[0][0]).toBe(`${BASE_URL}/family`);
      expect(get.mock.calls[0][1]?.params).toEqual([
        ["type", "boardgamefamily"],
        ["id", "20,10"]
      ]);
    });

    it("サーバーが返さなかった ID は省く", async () => {
      const { client } = setup([ok("family.xml")]);

      const result = await client.getGameFamilies([99, 10]);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((family) => family.id)).toEqual([10]);
    });

    it("空の入力ならリクエストしない", async () => {
      const { client, get } = setup([ok("family.xml")]);

      const result = await client.getGameFamilies([]);

      expect(result).toEqual({ ok: true, err: null, value: [] });
      expect(get).not.toHaveBeenCalled();
    });

    it("getGameFamily は見つからなければ null", async () => {
      const { client } = setup([{ status: 200, body: "<items/>" }]);

      const result = await client.getGameFamily(30);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toBeNull();
    });
  });

  describe("search", () => {
    it("exact 検索は名前が完全一致する結果だけを返す", async () => {
      const { client, get } = setup([ok("search.xml")]);

      const result = await client.search("River Crossing", { exact: true });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toEqual({
        query: "River Crossing",
        exact: true,
        results: [{ id: 2001, itemType: "boardgame", name: "River Crossing", yearPublished: 2015 }]
      });
      expect(result.value.results.every((entry) => entry.name === "River Crossing")).toBe(true);
      expect(get.mock.calls[0][1]?.params).toContainEqual(["exact", "1"]);
    });

    it("通常の検索はサーバーの結果をそのまま返す", async () => {
      const { client } = setup([ok("search.xml")]);

      const result = await client.search("River");

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.exact).toBe(false);
      expect(result.value.results.map((entry) => entry.id)).toEqual([2001, 2002, 2003]);
    });

    it("同期エンドポイントの <message> 本文は ParseError", async () => {
      const { client } = setup([ok("collection-pending.xml")]);

      const result = await client.search("River");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.err.kind).toBe("parse");
    });
  });

  describe("getHotList", () => {
    it("最大10件を順位順に返す", async () => {
      const { client, get } = setup([ok("hot.xml")]);

      const result = await client.getHotList();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((entry) => entry.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(get.mock.calls[0][1]?.params).toEqual([["type", "boardgame"]]);
    });

    it("パーサーが拒否する文書でも reject せず ParseError を返す", async () => {
      const { client } = setup([{ status: 200, body: '<!DOCTYPE items [<!ENTITY x SYSTEM "y">]><items/>' }]);

      const result = await client.getHotList();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.err.kind).toBe("parse");
    });

    it("HTTP エラーは HttpError", async () => {
      const { client, logger } = setup([{ status: 500 }]);

      const result = await client.getHotList();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.err.kind).toBe("http");
      expect(logger.warn).toHaveBeenCalledWith(
        `HTTP Error: unexpected status (Status: 500) for ${BASE_URL}/hot`
      );
    });
  });

  it("不正な設定では ConfigError を投げる", () => {
    expect(() => setup([], { retry: { ...config.retry, maxAttempts: 0 } })).toThrow("maxAttempts");
  });
});
