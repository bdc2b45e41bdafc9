import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import type { Logger } from "@/application/ports/logger";
import { BaseError, ConfigError, type BggError, type Result } from "@/domain/error";
import { createBggClient, type BggClient } from "@/interface/client";
import { ConsoleLogger } from "@/infrastructure/logging/console-logger";
import { createClientConfig } from "@/shared/config/env-config";

export type CliCommand =
  | { readonly name: "hot" }
  | { readonly name: "search"; readonly query: string; readonly exact: boolean }
  | { readonly name: "family"; readonly ids: number[] }
  | { readonly name: "collection"; readonly username: string; readonly filter: "all" | "owned" | "wishlist" };

export class CliUsageError extends BaseError {}

const parseIds = (raw: string): number[] =>
  raw.split(",").map((part) => {
    const id = Number(part.trim());
    if (!Number.isInteger(id) || id <= 0) {
      throw new CliUsageError(`family: invalid id "${part}"`);
    }
    return id;
  });

type ParsedCommand =
  | Exclude<CliCommand, { readonly name: "family" }>
  | { readonly name: "family"; readonly rawIds: string };

/**
 * `argv` without the node binary and script path.
 * Returns `null` when yargs printed the help text instead of selecting a command.
 */
export function parseCommand(argv: readonly string[]): CliCommand | null {
  const parsed: { command?: ParsedCommand } = {};

  yargs([...argv])
    .scriptName("bgg")
    .command("hot", "ホットリスト(上位10件)を表示する", (y) => y, () => {
      parsed.command = { name: "hot" };
    })
    .command(
      "search <query..>",
      "ゲームを名前で検索する",
      (y) =>
        y
          .positional("query", { type: "string", array: true, demandOption: true })
          .option("exact", { type: "boolean", default: false, description: "名前の完全一致だけを返す" }),
      (args) => {
        parsed.command = { name: "search", query: args.query.join(" "), exact: args.exact };
      }
    )
    .command(
      "family <ids>",
      "ゲームファミリーを取得する(カンマ区切りのID)",
      (y) => y.positional("ids", { type: "string", demandOption: true }),
      (args) => {
        parsed.command = { name: "family", rawIds: args.ids };
      }
    )
    .command(
      "collection <username>",
      "ユーザーのコレクションを取得する",
      (y) =>
        y
          .positional("username", { type: "string", demandOption: true })
          .option("owned", { type: "boolean", default: false, description: "所有しているものだけ" })
          .option("wishlist", { type: "boolean", default: false, description: "ウィッシュリストだけ" })
          .conflicts("owned", "wishlist"),
      (args) => {
        const filter = args.owned ? "owned" : args.wishlist ? "wishlist" : "all";
        parsed.command = { name: "collection", username: args.username, filter };
      }
    )
    .demandCommand(1, "missing command")
    .strict()
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw new CliUsageError(error?.message ?? message);
    })
    .wrap(null)
    .parseSync();

  const { command } = parsed;
  if (command === undefined) {
    return null;
  }
  return command.name === "family" ? { name: "family", ids: parseIds(command.rawIds) } : command;
}

export const runCommand = async (client: BggClient, command: CliCommand): Promise<Result<unknown, BggError>> => {
  switch (command.name) {
    case "hot":
      return client.getHotList();
    case "search":
      return client.search(command.query, { exact: command.exact });
    case "family":
      return client.getGameFamilies(command.ids);
    case "collection":
      switch (command.filter) {
        case "owned":
          return client.getOwned(command.username);
        case "wishlist":
          return client.getWishlist(command.username);
        case "all":
          return client.getCollection(command.username);
      }
  }
};

export type CliDependencies = {
  readonly createClient?: (logger: Logger) => BggClient;
  readonly logger?: Logger;
  readonly write?: (text: string) => void;
};

export async function runCli(argv: string[], dependencies: CliDependencies = {}): Promise<number> {
  const logger = dependencies.logger ?? new ConsoleLogger("bgg");
  const write = dependencies.write ?? ((text: string) => console.log(text));

  let command: CliCommand | null;
  try {
    command = parseCommand(hideBin(argv));
  } catch (error) {
    if (error instanceof CliUsageError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
  if (command === null) {
    return 0;
  }

  let client: BggClient;
  try {
    client = dependencies.createClient?.(logger) ?? createBggClient(createClientConfig({ envPath: ".env" }), { logger });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("invalid configuration", error);
      return 1;
    }
    throw error;
  }
  const result = await runCommand(client, command);
  if (!result.ok) {
    logger.error(`${command.name} failed`, result.err);
    return 1;
  }

  write(JSON.stringify(result.value, null, 2));
  return 0;
}
