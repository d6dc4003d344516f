import fs from "node:fs/promises";
import { Command } from "commander";
import { cleanSnapshot, toWireDecision } from "@team-standardizer/matcher";
import { Status } from "@team-standardizer/shared";
import { errorMessage } from "../errors.js";
import { jsonValueSchema } from "../schemas.js";
import type { StandardizationService } from "../service.js";

export interface CliContext {
  /** Builds a service over the configured store. Not loaded yet. */
  openService: () => StandardizationService;
  write: (text: string) => void;
}

const json = (value: unknown) => JSON.stringify(value, null, 2);

async function withService<T>(context: CliContext, run: (service: StandardizationService) => Promise<T>): Promise<T> {
  const service = context.openService();
  try {
    await service.load();
    return await run(service);
  } finally {
    service.close();
  }
}

async function readDocument(file: string) {
  const text = await fs.readFile(file, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new Error(`${file} is not valid JSON: ${errorMessage(error)}`);
  }
  const parsed = jsonValueSchema.safeParse(data);
  if (!parsed.success) throw new Error(`${file} is not a JSON document`);
  return parsed.data;
}

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program.name("team-standardizer").description("Standardize sports team names against a canonical registry");

  program
    .command("standardize")
    .description("Standardize a single team name")
    .argument("<name>", "Team name as it appears in the feed")
    .requiredOption("-s, --sport <sport>", "Sport (registry category)")
    .option("--no-auto-add", "Never add the name to the registry")
    .option("--explain", "Show the per-metric scores against the closest existing name")
    .action(async (name: string, options: { sport: string; autoAdd: boolean; explain?: boolean }) => {
      await withService(context, async (service) => {
        const { name: standardized, decision } = service.standardize(name, options.sport, options.autoAdd);
        context.write(json({ original: name, standardized, details: toWireDecision(decision) }));

        if (options.explain) {
          const nearest = service.standardizer.matcher.bestMatch(name, service.standardizer.registry.lookup(options.sport), 0);
          if (nearest) context.write(json(service.standardizer.matcher.explain(name, nearest.candidate)));
        }
        if (decision.status === Status.AutoAdded && service.autoSave) await service.save();
      });
    });

  program
    .command("process")
    .description("Standardize every team field in a JSON document")
    .argument("<file>", "JSON file to process")
    .option("-s, --sport <sport>", "Use this sport for every field instead of the document's own")
    .option("--no-auto-add", "Never add names to the registry")
    .option("-w, --write", "Overwrite the input file instead of printing the result")
    .action(async (file: string, options: { sport?: string; autoAdd: boolean; write?: boolean }) => {
      const document = await readDocument(file);
      await withService(context, async (service) => {
        const { document: processed, summary, added } = await service.process(document, {
          sport: options.sport,
          autoAdd: options.autoAdd,
        });

        if (options.write) {
          await fs.writeFile(file, `${json(processed)}\n`, "utf8");
          context.write(`Wrote ${file}`);
        } else {
          context.write(json(processed));
        }
        context.write(
          `Processed ${summary.teams_processed} teams, changes: ${summary.changes_made}, new teams: ${summary.new_teams_added}`,
        );
        for (const entry of added) {
          context.write(`  + ${entry.category}/${entry.name}`);
        }
      });
    });

  program
    .command("stats")
    .description("Show registry statistics")
    .action(async () => {
      await withService(context, async (service) => {
        context.write(json(service.statistics()));
      });
    });

  program
    .command("clean")
    .description("Remove blank names and duplicates from the stored snapshot")
    .option("--merge-normalized", "Also drop names whose normalized form repeats an earlier one in the same sport")
    .option("--dry-run", "Report what would change without saving")
    .action(async (options: { mergeNormalized?: boolean; dryRun?: boolean }) => {
      const service = context.openService();
      try {
        const records = (await service.store.load()) ?? [];
        const report = cleanSnapshot(records, {
          mergeNormalized: options.mergeNormalized ?? false,
          normalizer: (raw) => service.standardizer.matcher.normalize(raw),
        });

        context.write(`Records: ${records.length} -> ${report.records.length}`);
        context.write(`  blank names removed: ${report.removedEmpty.length}`);
        context.write(`  duplicates removed: ${report.removedDuplicates.length}`);
        for (const { sport, canonical_team_name } of report.removedDuplicates) {
          context.write(`    ${sport}/${canonical_team_name}`);
        }
        context.write(`  normalized duplicates merged: ${report.mergedNormalized.length}`);
        for (const { record, keptName } of report.mergedNormalized) {
          context.write(`    ${record.sport}/${record.canonical_team_name} -> ${keptName}`);
        }

        if (options.dryRun) {
          context.write("Dry run, nothing saved");
          return;
        }
        const receipt = await service.store.save(report.records);
        context.write(`Saved ${receipt.count} teams to ${receipt.location}`);
      } finally {
        service.close();
      }
    });

  return program;
}
