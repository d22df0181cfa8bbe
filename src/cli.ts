/**
 * Command-line entry point.
 *
 *   npm run campaign -- data/examples/campaign-brief.json
 *
 * Exit code 0 only when the campaign completed without errors. A blocked
 * message, an invalid brief or any error exits 1.
 */

import { gateOptionsFromConfig, loadConfig } from "@/lib/config";
import { ComplianceGate } from "@/lib/compliance/gate";
import { resolveBrand } from "@/lib/compliance/brand";
import { placedLogoSize, SharpCreativeComposer } from "@/lib/creatives/composer";
import { passthroughTranslator } from "@/lib/creatives/translator";
import { loadTermTable } from "@/lib/legal/term-table";
import { createUploader } from "@/lib/storage/blob-upload";
import { runCampaign } from "@/lib/pipeline/campaign";
import { loadCampaignBrief } from "@/lib/pipeline/brief";
import { errorMessage } from "@/lib/errors";

async function main(argv: string[]): Promise<number> {
  const briefPath = argv[0];
  if (!briefPath) {
    console.log("Usage: campaign <campaign_brief.json>");
    console.log("Example: npm run campaign -- data/examples/campaign-brief.json");
    return 1;
  }

  try {
    const config = loadConfig();
    const termTable = loadTermTable(config.prohibitedTermsPath);
    const brief = loadCampaignBrief(briefPath);

    const result = await runCampaign(brief, {
      gate: new ComplianceGate(gateOptionsFromConfig(config)),
      termTable,
      translator: passthroughTranslator,
      composer: new SharpCreativeComposer(config.outputDir),
      uploader: createUploader(config),
      // Every canvas shares the 1080px short side, so the placed logo size is the same for all ratios
      resolveBrand: (spec) => resolveBrand(spec, { logoSize: placedLogoSize("1:1") }),
      reportsDir: config.reportsDir,
    });

    return result.status === "completed" ? 0 : 1;
  } catch (error) {
    console.error(`[CLI] ${errorMessage(error)}`);
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[CLI] Pipeline execution failed:", error);
    process.exitCode = 1;
  }
);
