import { Command, CommanderError } from "commander";
import { handleCommandError } from "./cli/error-handler.js";
import {
  type ExportOptions,
  type FetchOptions,
  runExport,
  runFetch,
  runQuery,
} from "./commands/index.js";
import type { Config } from "./config.js";
import { type DB, withDatabase } from "./database.js";
import type { ArticleFilter } from "./schemas/article.js";
import { DEFAULT_EXPORT_FORMAT } from "./schemas/export.js";
import { initializeStore } from "./services/article-service.js";

/** Runs one command against an initialized store. */
export type CommandRunner = <T>(fn: (db: DB) => Promise<T>) => Promise<T>;

export function createRunner(config: Config): CommandRunner {
  return (fn) =>
    withDatabase(config, async (db) => {
      await initializeStore(db);
      return fn(db);
    });
}

function addFilterOptions(command: Command): Command {
  return command
    .option("-k, --keyword <keyword>", "filter by keyword in title or summary")
    .option("-s, --source <source>", "filter by news source (substring, case-insensitive)")
    .option("-d, --date <date>", "filter by publication date (YYYY-MM-DD)");
}

export function createProgram(runner: CommandRunner): Command {
  const program = new Command();

  // Set before the subcommands are added so they inherit it
  program
    .name("news-aggregator")
    .description("Collect news articles into a local store, then query and export them.")
    .exitOverride();

  program
    .command("fetch")
    .description("Fetch articles and save them to the store.")
    .option("-s, --source <source>", "only keep articles whose source contains this text")
    .action(async (options: FetchOptions) => {
      await runner((db) => runFetch(db, options));
    });

  addFilterOptions(
    program.command("query").description("Query stored articles and print them."),
  ).action(async (options: ArticleFilter) => {
    await runner((db) => runQuery(db, options));
  });

  addFilterOptions(
    program
      .command("export")
      .description("Filter stored articles and export them to a file.")
      .argument("<output_file>", "path of the file to write, e.g. report.csv"),
  )
    .option("-f, --format <format>", "output format: csv, excel or json", DEFAULT_EXPORT_FORMAT)
    .action(async (outputFile: string, options: ExportOptions) => {
      await runner((db) => runExport(db, outputFile, options));
    });

  return program;
}

/**
 * Parses `argv` (node-style, including the executable and script) and runs
 * the selected command. Resolves to the process exit code.
 */
export async function run(argv: readonly string[], runner: CommandRunner): Promise<number> {
  const program = createProgram(runner);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already printed usage errors and help
    if (err instanceof CommanderError) return err.exitCode;
    return handleCommandError(err);
  }
}
