/**
 * Render command - Prints a rendered document, optionally with one link highlighted
 */

import { z } from "zod";
import {
  createDocumentLoader,
  highlightFocusedLink,
  renderMarkdown,
} from "../../modules";
import {
  CommonOptionsSchema,
  loadCommandConfig,
  reportConfigErrors,
  resolveDocument,
} from "./shared";

const RenderOptionsSchema = CommonOptionsSchema.extend({
  focus: z.coerce.number().int().optional(),
});

type Options = z.input<typeof RenderOptionsSchema>;

export async function renderCommand(file: string, opts: Options): Promise<void> {
  try {
    const options = RenderOptionsSchema.parse(opts);
    const { config, errors } = await loadCommandConfig(options);
    reportConfigErrors(errors);

    const filePath = await resolveDocument(file);
    const load = createDocumentLoader(config.pager.root);
    const { document, links } = await load(filePath);

    let output = renderMarkdown(document.body, {
      showLineNumbers: config.pager.showLineNumbers,
    });

    if (options.focus !== undefined) {
      if (!links.at(options.focus)) {
        console.error(
          `No link at index ${options.focus} (${links.length} followable)`,
        );
      }
      output = highlightFocusedLink(output, links, options.focus);
    }

    console.log(output);
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
