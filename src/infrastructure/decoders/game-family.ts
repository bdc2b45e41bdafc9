import { DecodeError, type Result } from "@/domain/error";
import type { GameFamily, GameReference } from "@/domain/types";
import {
  correct,
  correctOptional,
  decodeWith,
  optionalChildText,
  requireAttribute,
  requirePositiveId,
  type DecodeOptions
} from "@/infrastructure/decoders/fields";
import type { XmlElement } from "@/infrastructure/xml/xml-document";

// <link> は「このファミリーに属するゲーム」だけを拾う。他の type は将来の拡張として無視する
const GAME_LINK_TYPE = "boardgamefamily";

const readGames = (item: XmlElement, options: DecodeOptions): GameReference[] =>
  item
    .children("link")
    .filter((link) => link.attribute("type") === GAME_LINK_TYPE)
    .map((link) => ({
      id: requirePositiveId(link, "id"),
      name: correct(requireAttribute(link, "value"), options)
    }));

const readFamily = (item: XmlElement, options: DecodeOptions): GameFamily => {
  const names = item.children("name");
  const primary = names.find((name) => name.attribute("type") === "primary");
  if (primary === undefined) {
    throw DecodeError.missingField("name", item.name);
  }

  return {
    id: requirePositiveId(item, "id"),
    name: correct(requireAttribute(primary, "value"), options),
    alternateNames: names
      .filter((name) => name.attribute("type") === "alternate")
      .map((name) => correct(requireAttribute(name, "value"), options)),
    image: optionalChildText(item, "image"),
    thumbnail: optionalChildText(item, "thumbnail"),
    description: correctOptional(optionalChildText(item, "description"), options),
    games: readGames(item, options)
  };
};

export const decodeGameFamilies = (root: XmlElement, options: DecodeOptions): Result<GameFamily[], DecodeError> =>
  decodeWith(() => root.children("item").map((item) => readFamily(item, options)));
