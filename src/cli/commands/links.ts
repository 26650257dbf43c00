/**
 * Links command - Lists the followable links of a document
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import { createDocumentLoader } from "../../modules";
import type { FollowableLink } from "../../types";
import {
  CommonOptionsSchema,
  loadCommandConfig,
  reportConfigErrors,
  resolveDocument,
} from "./shared";

const LinksOptionsSchema = CommonOptionsSchema.extend({
  json: z.boolean().optional(),
});

type Options = z.infer<typeof LinksOptionsSchema>;

/**
 * One table row: index, label, root-relative target and fragment
 */
export function formatLinkRow(link: FollowableLink, index: number): string {
  const fragment = link.fragment ? chalk.dim(`#${link.fragment}`) : "";
  return `   ${chalk.dim(String(index).padStart(3))} ${chalk.bold(link.label)} ${chalk.dim("→")} ${chalk.cyan(link.resolvedNote)}${fragment}`;
}

export async function linksCommand(file: string, opts: Options): Promise<void> {
  const spinner = opts.json
    ? null
    : ora({ text: "Resolving links...", indent: 2 }).start();

  try {
    const options = LinksOptionsSchema.parse(opts);
    const { config, errors } = await loadCommandConfig(options);
    const filePath = await resolveDocument(file);

    const load = createDocumentLoader(config.pager.root);
    const { document, links } = await load(filePath);

    spinner?.stop();
    reportConfigErrors(errors);

    if (options.json) {
      console.log(JSON.stringify(links.toArray(), null, 2));
      return;
    }

    console.log("");
    console.log(
      `  ${chalk.bold(document.note)} ${chalk.dim("·")} ${chalk.dim(`${links.length} followable link${links.length === 1 ? "" : "s"}`)}`,
    );
    [...links].forEach((link, index) => {
      console.log(formatLinkRow(link, index));
    });
    console.log("");
  } catch (error) {
    if (spinner) {
      spinner.fail("Failed to resolve links");
    }
    console.error(error);
    process.exit(1);
  }
}
