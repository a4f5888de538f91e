#!/usr/bin/env node
import { Command } from "commander";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { lex, renderTokenStream } from "./lex.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { KEYWORDS } from "./lexer/keywords.js";
import { DUMMY_TOKENS } from "./lexer/layout.js";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(".ofs"));
  if (found.length === 0) {
    throw new Error("No .ofs file found in the current directory. Pass a file path explicitly.");
  }
  if (found.length > 1) {
    throw new Error(`Multiple .ofs files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

const program = new Command()
  .name("offside")
  .description("Scanner and indentation preparser for layout-sensitive .ofs sources")
  .version("0.3.0");

program
  .command("tokens [file]")
  .description("Print the token stream of a .ofs file (defaults to the single .ofs file in the current directory)")
  .option("--raw", "Skip the preparser and print the scanner's tokens")
  .option("--json", "Print the tokens as JSON")
  .action(async (file: string | undefined, opts: { raw?: boolean; json?: boolean }) => {
    try {
      file = await resolveDefaultFile(file);
      const source = await readFile(file, "utf-8");
      const result = lex(source, file, { preparse: !opts.raw });

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(source, result.errors));
        process.exit(1);
      }

      if (opts.json) {
        console.log(JSON.stringify(result.tokens, (_key, value) =>
          typeof value === "bigint" ? value.toString() : value,
          2,
        ));
        return;
      }

      console.log(renderTokenStream(result.tokens));
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("check [file]")
  .description("Lex a .ofs file and report the first error, if any")
  .action(async (file: string | undefined) => {
    try {
      file = await resolveDefaultFile(file);
      const source = await readFile(file, "utf-8");
      const result = lex(source, file);

      if (result.errors.length > 0) {
        console.error(formatDiagnostics(source, result.errors));
        process.exit(1);
      }

      console.log(`${file}: ${result.tokens.length} tokens, no errors`);
    } catch (e) {
      console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  });

program
  .command("introspect")
  .description("Output the keyword table and the layout token catalog as JSON")
  .option("--keywords", "Show only keywords")
  .option("--dummies", "Show only the layout tokens each construct inserts")
  .action((opts: { keywords?: boolean; dummies?: boolean }) => {
    const keywords = [...KEYWORDS.keys()];
    const dummies = DUMMY_TOKENS;

    if (opts.keywords) {
      console.log(JSON.stringify({ keywords }, null, 2));
    } else if (opts.dummies) {
      console.log(JSON.stringify({ dummies }, null, 2));
    } else {
      console.log(JSON.stringify({ version: "0.3.0", keywords, dummies }, null, 2));
    }
  });

await program.parseAsync();
