/**
 * Publish command - Resolves settings, reads sources and writes output files
 */

import path from "node:path";
import glob from "fast-glob";
import ora from "ora";
import { z } from "zod";
import { deliver, publish, stats, toBufferEncoding, type PublishReport } from "../../modules";
import { getReader } from "../../readers";
import { WRITERS, getWriter, hasWriter } from "../../writers";
import { logger, processCounter, Tracker } from "../../utils";

const severity = z.coerce.number().int().min(0).max(10);

const PublishOptionsSchema = z.object({
  writer: z.string().refine(hasWriter, {
    message: `writer must be one of: ${Object.keys(WRITERS).join(", ")}`,
  }),
  output: z.string(),
  config: z.string().optional(),
  reportLevel: severity.optional(),
  haltLevel: severity.optional(),
  set: z.array(z.string().regex(/^[^=]+=/, "expected name=value")).optional(),
  sourceConfig: z.boolean().default(true),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof PublishOptionsSchema>;

/**
 * Command line overrides as raw setting values
 */
export function parseOverrides(options: z.infer<typeof PublishOptionsSchema>): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const assignment of options.set ?? []) {
    const separator = assignment.indexOf("=");
    overrides[assignment.slice(0, separator).trim()] = assignment.slice(separator + 1);
  }
  if (options.reportLevel !== undefined) overrides["report-level"] = String(options.reportLevel);
  if (options.haltLevel !== undefined) overrides["halt-level"] = String(options.haltLevel);
  return overrides;
}

/**
 * Output path for a source: <output>/<name><extension>
 */
export function outputPath(source: string, outputDir: string, extension: string): string {
  const name = path.basename(source, path.extname(source));
  return path.resolve(outputDir, `${name}${extension}`);
}

export async function publishCommand(inputs: string[], opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = PublishOptionsSchema.parse(opts);
    if (options.verbose) logger.setLevel("debug");

    const definition = getWriter(options.writer);
    const reader = getReader("text");
    const overrides = parseOverrides(options);

    spinner.text = "Finding sources...";
    const files = await glob(inputs, { absolute: true, onlyFiles: true, unique: true });
    files.sort();

    const tracker = new Tracker();
    tracker.setTotalSources(files.length);

    for (const file of files) {
      spinner.text = `Publishing ${path.relative(process.cwd(), file)}...`;
      const target = outputPath(file, options.output, definition.extension);

      let published: PublishReport;
      try {
        published = await publish({
          source: { kind: "path", path: file },
          reader,
          writer: definition,
          configFile: options.config,
          sourceConfig: options.sourceConfig,
          overrides,
          counter: processCounter,
          // Diagnostics lines must not be drawn over by the spinner
          report: (line) => {
            spinner.clear();
            logger.report(line);
          },
        });
      } catch (error) {
        tracker.trackError(file, error, "read");
        continue;
      }

      tracker.trackWarnings(published.warnings);
      tracker.trackConfigErrors(published.configErrors);
      tracker.trackConditions(published.conditions);
      tracker.trackVisitorErrors(file, published.visitorErrors);

      if (!options.dryRun) {
        try {
          const encoding = toBufferEncoding(published.settings.string("output-encoding"));
          await deliver(published.output, target, encoding);
        } catch (error) {
          tracker.trackError(target, error, "write");
          continue;
        }
      }
      tracker.incrementPublished();
    }

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    if (files.length === 0) {
      logger.warn(`No sources matched: ${inputs.join(" ")}`);
    }

    stats(tracker, options.verbose);

    if (tracker.hasFailures()) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail("Publish failed");
    console.error(error);
    process.exit(1);
  }
}
