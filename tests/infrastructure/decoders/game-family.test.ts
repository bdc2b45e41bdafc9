import { describe, it, expect } from "vitest";

import { decodeGameFamilies } from "../../../src/infrastructure/decoders/game-family";
import { parseXmlDocument, type XmlElement } from "../../../src/infrastructure/xml/xml-document";
import { readFixture } from "../../helpers/fixtures";

const rootOf = (xml: string): XmlElement => {
  const document = parseXmlDocument(xml, { expectedRoot: "items" });
  if (!document.ok) throw document.err;
  return document.value.root;
};

describe("decodeGameFamilies", () => {
  const root = rootOf(readFixture("family.xml"));

  it("ファミリーの名前・説明・所属ゲームをデコードする", () => {
    const result = decodeGameFamilies(root, { entityMode: "repair" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([
      {
        id: 10,
        name: "Series: Lantern Worlds",
        alternateNames: ["Lantern Worlds", "Laternenwelten"],
        image: "https://example.com/families/10.png",
        thumbnail: "https://example.com/families/10_t.png",
        description: "A family of tile games\n\nDesigned in Köln — since 2019.",
        games: [
          { id: 1001, name: "Glück im Garten" },
          { id: 1003, name: "The Lantern Market" }
        ]
      },
      { id: 20, name: "Theme: Harbours", alternateNames: [], games: [] }
    ]);
  });

  it("preserve モードでは説明の文字参照を残す", () => {
    const result = decodeGameFamilies(root, { entityMode: "preserve" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0].description).toBe("A family of tile games&#10;&#10;Designed in K&#195;&#182;ln — since 2019.");
    expect(result.value[0].games[0].name).toBe("GlÃ¼ck im Garten");
  });

  it("ID が 0 のファミリーは unexpected-value", () => {
    const result = decodeGameFamilies(
      rootOf('<items><item type="boardgamefamily" id="0"><name type="primary" value="Zero"/></item></items>'),
      { entityMode: "repair" }
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.err.reason).toBe("unexpected-value");
    expect(result.err.field).toBe("id");
    expect(result.err.rawValue).toBe("0");
  });

  it("primary 名がなければ missing-field", () => {
    const result = decodeGameFamilies(
      rootOf('<items><item type="boardgamefamily" id="5"><name type="alternate" value="Alt"/></item></items>'),
      { entityMode: "repair" }
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.err.reason).toBe("missing-field");
    expect(result.err.field).toBe("name");
    expect(result.err.element).toBe("item");
  });
});
