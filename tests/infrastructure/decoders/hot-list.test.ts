import { describe, it, expect } from "vitest";

import { decodeHotList } from "../../../src/infrastructure/decoders/hot-list";
import { parseXmlDocument, type XmlElement } from "../../../src/infrastructure/xml/xml-document";
import { readFixture } from "../../helpers/fixtures";

const rootOf = (xml: string): XmlElement => {
  const document = parseXmlDocument(xml, { expectedRoot: "items" });
  if (!document.ok) throw document.err;
  return document.value.root;
};

describe("decodeHotList", () => {
  it("上位10件を順位順に返す", () => {
    const result = decodeHotList(rootOf(readFixture("hot.xml")), { entityMode: "repair" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(10);
    expect(result.value.map((entry) => entry.rank)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(result.value[0]).toEqual({
      rank: 1,
      id: 3001,
      name: "Hot Game 1",
      thumbnail: "https://example.com/hot/3001.png",
      yearPublished: 2021
    });
    expect(result.value[1].yearPublished).toBeUndefined();
  });

  it("順位が重複していれば unexpected-value", () => {
    const result = decodeHotList(
      rootOf('<items><item id="1" rank="1"><name value="A"/></item><item id="2" rank="1"><name value="B"/></item></items>'),
      { entityMode: "repair" }
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.err.reason).toBe("unexpected-value");
    expect(result.err.field).toBe("rank");
  });

  it("0 以下の順位は unexpected-value", () => {
    const result = decodeHotList(rootOf('<items><item id="1" rank="0"><name value="A"/></item></items>'), {
      entityMode: "repair"
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.err.reason).toBe("unexpected-value");
    expect(result.err.rawValue).toBe("0");
  });

  it("名前がなければ missing-field", () => {
    const result = decodeHotList(rootOf('<items><item id="1" rank="1"></item></items>'), { entityMode: "repair" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.err.reason).toBe("missing-field");
    expect(result.err.field).toBe("name");
  });
});
