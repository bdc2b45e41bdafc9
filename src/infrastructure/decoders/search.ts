import { DecodeError, type Result } from "@/domain/error";
import type { SearchResult } from "@/domain/types";
import {
  correct,
  decodeWith,
  optionalChildIntegerValue,
  requireAttribute,
  requireChild,
  requireItemType,
  requirePositiveId,
  type DecodeOptions
} from "@/infrastructure/decoders/fields";
import type { XmlElement } from "@/infrastructure/xml/xml-document";

const readResult = (item: XmlElement, options: DecodeOptions): SearchResult => ({
  id: requirePositiveId(item, "id"),
  itemType: requireItemType(item, "type"),
  name: correct(requireAttribute(requireChild(item, "name"), "value"), options),
  yearPublished: optionalChildIntegerValue(item, "yearpublished")
});

export const decodeSearchResults = (root: XmlElement, options: DecodeOptions): Result<SearchResult[], DecodeError> =>
  decodeWith(() => root.children("item").map((item) => readResult(item, options)));
