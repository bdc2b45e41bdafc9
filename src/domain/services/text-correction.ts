export const ENTITY_MODES = ["repair", "preserve"] as const;

/**
 * How text fields are post-processed after the XML reader decoded them once.
 *
 * BGG escapes the individual UTF-8 bytes of non-ASCII characters, so `Glück` travels as
 * `Gl&#195;&#188;ck` and reads back as `GlÃ¼ck`. Descriptions are escaped one level deeper
 * (`&amp;#195;`), so they still hold literal `&#195;` after the XML pass.
 *
 * - `repair`: decode leftover numeric character references, then re-read every run of
 *   U+0080..U+00FF that forms valid UTF-8 as UTF-8 bytes. `Gl&#195;&#188;ck` -> `Glück`.
 * - `preserve`: return the text as the XML reader produced it. `Gl&#195;&#188;ck` -> `GlÃ¼ck`.
 */
export type EntityMode = (typeof ENTITY_MODES)[number];

export const isEntityMode = (value: string): value is EntityMode => ENTITY_MODES.some((mode) => mode === value);

const RESIDUAL_CHARACTER_REFERENCE = /&#(?:[xX]([0-9a-fA-F]{1,6})|([0-9]{1,7}));/g;
const LATIN1_HIGH_RUN = /[\u0080-\u00ff]+/g;

const utf8 = new TextDecoder("utf-8", { fatal: true });

export const isScalarValue = (codePoint: number): boolean =>
  Number.isInteger(codePoint) &&
  codePoint > 0 &&
  codePoint <= 0x10ffff &&
  (codePoint < 0xd800 || codePoint > 0xdfff);

export const decodeResidualCharacterReferences = (text: string): string =>
  text.replace(RESIDUAL_CHARACTER_REFERENCE, (match: string, hex: string | undefined, decimal: string | undefined) => {
    const codePoint = hex !== undefined ? Number.parseInt(hex, 16) : Number.parseInt(decimal ?? "", 10);
    return isScalarValue(codePoint) ? String.fromCodePoint(codePoint) : match;
  });

// Number of bytes announced by a UTF-8 lead byte; 0 for anything that cannot start a multi-byte sequence.
const sequenceLength = (lead: number): number => {
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
};

const decodeUtf8 = (bytes: Uint8Array): string | null => {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
};

const repairRun = (run: string): string => {
  const bytes = Uint8Array.from(run, (char) => char.charCodeAt(0));
  let repaired = "";
  let index = 0;

  while (index < bytes.length) {
    const length = sequenceLength(bytes[index]);
    if (length > 0 && index + length <= bytes.length) {
      const decoded = decodeUtf8(bytes.subarray(index, index + length));
      if (decoded !== null) {
        repaired += decoded;
        index += length;
        continue;
      }
    }
    repaired += run[index];
    index += 1;
  }

  return repaired;
};

/** Re-reads Latin-1 mis-decoded UTF-8 (`Ã¼` -> `ü`); characters that do not form valid UTF-8 stay as they are. */
export const repairMojibake = (text: string): string => text.replace(LATIN1_HIGH_RUN, repairRun);

export const correctText = (text: string, mode: EntityMode): string => {
  switch (mode) {
    case "preserve":
      return text;
    case "repair":
      return repairMojibake(decodeResidualCharacterReferences(text));
  }
};
