import fs from "fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { renderAgm, splitHeader } from "agm-markup";
import { Config } from "./config";
import { SiteBuilder, type BuildReport, type SiteBuilderConfig } from "./services/builder";
import { handleShutdown, startDevServer } from "./server";
import { createLogger } from "./utils/logger";

const logger = createLogger({ file: "cli" });

export type CliIo = {
  stdout: (text: string) => void;
  setExitCode: (code: number) => void;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function builderConfig(): SiteBuilderConfig {
  return {
    sourceDir: Config.SOURCE_DIR,
    outputDir: Config.OUTPUT_DIR,
    templateDir: Config.TEMPLATE_DIR,
    defaultTemplate: Config.DEFAULT_TEMPLATE,
    siteTitle: Config.SITE_TITLE,
  };
}

export function parsePort(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) {
    throw new InvalidArgumentError(`invalid port: ${value}`);
  }
  return n;
}

async function runBuild(config: SiteBuilderConfig, io: CliIo): Promise<BuildReport> {
  const report = await new SiteBuilder(config, logger).build();
  io.stdout(`${report.pages.length} pages, ${report.copiedCount} files copied\n`);
  for (const failure of report.failures) {
    io.stdout(`failed: ${failure.source}: ${failure.error}\n`);
  }
  if (report.failures.length > 0) io.setExitCode(1);
  return report;
}

export function createProgram(
  config: SiteBuilderConfig = builderConfig(),
  io: CliIo = defaultIo,
): Command {
  const program = new Command();
  program.name("agm").description("Build a static site from AGM documents");

  program
    .command("build")
    .description("compile every document of the source directory")
    .action(async () => {
      await runBuild(config, io);
    });

  program
    .command("serve")
    .description("build the site and serve the output directory")
    .option("-p, --port <num>", "port to listen on", parsePort, Config.SERVE_PORT)
    .option("--host <host>", "host to bind", Config.SERVE_HOST)
    .action(async (opts: { port: number; host: string }) => {
      await runBuild(config, io);
      const server = await startDevServer(config.outputDir, opts.host, opts.port);
      handleShutdown(server);
    });

  program
    .command("compile <file>")
    .description("print the body HTML of one document")
    .action(async (file: string) => {
      const text = await fs.readFile(file, "utf8");
      io.stdout(renderAgm(splitHeader(text).body) + "\n");
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((e) => {
      logger.error(`Fatal error: ${e}`);
      process.exit(1);
    });
}
