/**
 * View command - Interactive pager with link navigation
 */

import { join } from "path";
import { mkdir } from "fs/promises";
import { emitKeypressEvents } from "node:readline";
import { z } from "zod";
import {
  DirectoryWatcher,
  HELP_HEIGHT,
  PagerModel,
  PagerSession,
  createDocumentLoader,
  keyFromKeypress,
  pagerView,
  renderMarkdown,
  type Keypress,
} from "../../modules";
import type { LoggingConfig } from "../../types";
import { Logger, getLogDirectory } from "../../utils";
import {
  CommonOptionsSchema,
  loadCommandConfig,
  reportConfigErrors,
  resolveDocument,
} from "./shared";

const ViewOptionsSchema = CommonOptionsSchema.extend({
  watch: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ViewOptionsSchema>;

const ENTER_ALT_SCREEN = "\x1b[?1049h";
const EXIT_ALT_SCREEN = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const CLEAR_SCREEN = "\x1b[H\x1b[2J";

/**
 * The screen belongs to the pager, so logs go to a file or nowhere
 */
async function createSessionLogger(logging: LoggingConfig): Promise<Logger> {
  if (!logging.file) {
    return Logger.silent();
  }
  const directory = getLogDirectory();
  await mkdir(directory, { recursive: true });
  return Logger.toFile(logging.level, join(directory, "mdnav.log"));
}

export async function viewCommand(
  file: string | undefined,
  opts: Options,
): Promise<void> {
  const { stdin, stdout } = process;
  let logger: Logger | null = null;

  try {
    const options = ViewOptionsSchema.parse(opts);
    if (!file) {
      throw new Error("No document given. Usage: mdnav <file>");
    }

    const { config, errors } = await loadCommandConfig(options);
    if (options.watch === false) {
      config.pager.watch = false;
    }
    if (options.verbose) {
      config.logging.level = "debug";
    }
    reportConfigErrors(errors);

    const filePath = await resolveDocument(file);
    const loader = createDocumentLoader(config.pager.root);
    const render = (body: string) =>
      renderMarkdown(body, { showLineNumbers: config.pager.showLineNumbers });

    // Piped output: print the rendered document instead
    if (!stdin.isTTY || !stdout.isTTY) {
      const { document } = await loader(filePath);
      console.log(render(document.body));
      return;
    }

    const sessionLogger = await createSessionLogger(config.logging);
    logger = sessionLogger;
    const model = new PagerModel(
      {
        statusMessageTimeout: config.pager.statusMessageTimeout,
        watch: config.pager.watch,
        helpHeight: HELP_HEIGHT,
      },
      sessionLogger,
    );
    model.setSize(stdout.columns, stdout.rows);

    const session = new PagerSession(model, {
      loader,
      render,
      watcher: new DirectoryWatcher(sessionLogger),
      draw: (m) => stdout.write(CLEAR_SCREEN + pagerView(m)),
      logger: sessionLogger,
    });

    const onKeypress = (str: string | undefined, key: Keypress | undefined) => {
      const name = keyFromKeypress(str, key);
      if (name) {
        session.dispatch({ type: "key", key: name });
      }
    };
    const onResize = () => {
      session.dispatch({
        type: "resize",
        width: stdout.columns,
        height: stdout.rows,
      });
    };

    emitKeypressEvents(stdin);
    stdin.setRawMode(true);
    stdin.resume();
    stdin.on("keypress", onKeypress);
    stdout.on("resize", onResize);
    stdout.write(ENTER_ALT_SCREEN + HIDE_CURSOR);

    sessionLogger.info("starting pager", {
      file: filePath,
      root: config.pager.root,
    });

    try {
      session.open(filePath);
      await session.done;
    } finally {
      stdin.off("keypress", onKeypress);
      stdout.off("resize", onResize);
      stdin.setRawMode(false);
      stdin.pause();
      stdout.write(SHOW_CURSOR + EXIT_ALT_SCREEN);
      await sessionLogger.close();
    }
  } catch (error) {
    console.error(error);
    await logger?.close();
    process.exit(1);
  }
}
