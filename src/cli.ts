#!/usr/bin/env node
import { writeFile } from "node:fs/promises";

import { loadConfig } from "./config.js";
import { listSamples, buildSample } from "./samples.js";
import { createServer } from "./server.js";
import { assertArgs, parseArgs } from "./args.js";
import { createTranslationService } from "./translation/index.js";
import { TranslationService } from "./translator.js";
import { errorMessage } from "./utils.js";

async function run(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));
  assertArgs(cliArgs);
  const config = loadConfig();

  if (cliArgs.list) {
    listSamples().forEach((sample) => console.log(`${sample.name.padEnd(16)} ${sample.description}`));
    return;
  }

  // ─── Preview server mode ───────────────────────────
  if (cliArgs.serve) {
    createServer(cliArgs.port ?? config.port, {
      translator: createTranslationService(config.translator),
      card: config.card,
    });
    return;
  }

  // ─── Single card mode ──────────────────────────────
  const card = buildSample(cliArgs.sample ?? "", {
    schema: config.card.schema,
    version: cliArgs.version ?? config.card.version,
  });

  let translator: TranslationService | undefined;
  if (cliArgs.lang) {
    translator = createTranslationService(config.translator);
    if (!translator) {
      throw new Error("--lang needs a translation provider. Set TRANSLATOR_PROVIDER to azure or gemini.");
    }
    console.error(`  🌐 Translating '${cliArgs.sample}' to ${cliArgs.lang} via ${config.translator.provider}...`);
  }

  const document = await card.render({ language: cliArgs.lang, translator });
  const json = JSON.stringify(document, null, cliArgs.pretty ? 2 : undefined);

  if (cliArgs.out) {
    await writeFile(cliArgs.out, `${json}\n`, "utf8");
    console.error(`  ✅ Card written to ${cliArgs.out}`);
    return;
  }

  console.log(json);
}

run().catch((error) => {
  console.error(`Card generation failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
