import { DecodeError, type Result } from "@/domain/error";
import { HOT_LIST_MAX_RANK, type HotListEntry } from "@/domain/types";
import {
  correct,
  decodeWith,
  optionalChildIntegerValue,
  optionalChildValue,
  requireAttribute,
  requireChild,
  requireIntegerAttribute,
  requirePositiveId,
  type DecodeOptions
} from "@/infrastructure/decoders/fields";
import type { XmlElement } from "@/infrastructure/xml/xml-document";

const readEntry = (item: XmlElement, options: DecodeOptions): HotListEntry => {
  const rank = requireIntegerAttribute(item, "rank");
  if (rank < 1) {
    throw DecodeError.unexpectedValue("rank", item.name, String(rank));
  }
  return {
    rank,
    id: requirePositiveId(item, "id"),
    name: correct(requireAttribute(requireChild(item, "name"), "value"), options),
    thumbnail: optionalChildValue(item, "thumbnail"),
    yearPublished: optionalChildIntegerValue(item, "yearpublished")
  };
};

/**
 * The server ranks up to 50 items; only the top ten are kept, sorted by rank.
 * Ranks have to run 1, 2, 3... without gaps or duplicates.
 */
const topTen = (entries: HotListEntry[]): HotListEntry[] => {
  const ranked = entries.filter((entry) => entry.rank <= HOT_LIST_MAX_RANK).sort((a, b) => a.rank - b.rank);
  ranked.forEach((entry, index) => {
    if (entry.rank !== index + 1) {
      throw DecodeError.unexpectedValue("rank", "item", String(entry.rank));
    }
  });
  return ranked;
};

export const decodeHotList = (root: XmlElement, options: DecodeOptions): Result<HotListEntry[], DecodeError> =>
  decodeWith(() => topTen(root.children("item").map((item) => readEntry(item, options))));
