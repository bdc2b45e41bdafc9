import { readFileSync } from "node:fs";

export const readFixture = (name: string): string =>
  readFileSync(new URL(`../fixtures/${name}`, import.meta.url), "utf8");

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
