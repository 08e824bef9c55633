import { defineCommand } from "citty";
import { consola } from "consola";

import { loadConfig, parseCount, type TagCloudConfig } from "../../config/defaults.ts";
import { generateTagCloud } from "../../core/generator.ts";
import { readDocument, resolveOutputPath, writeTagCloud } from "../../io/document.ts";
import { exitWithError } from "../errors.ts";
import { formatGenerateSummary } from "../format.ts";
import { ask, askCount, canPrompt } from "../prompt.ts";

export const generateCommand = defineCommand({
  meta: {
    name: "generate",
    description: "Render the most frequent words of a document as an HTML tag cloud",
  },
  args: {
    input: {
      type: "positional",
      description: "Text document to read",
      required: false,
    },
    count: {
      type: "string",
      description: "Number of words in the cloud",
      alias: "n",
    },
    output: {
      type: "string",
      description: "HTML file to write (stdout when omitted)",
      alias: "o",
    },
    folder: {
      type: "string",
      description: "Folder the output file is written to",
      alias: "d",
    },
    title: {
      type: "string",
      description: "Title shown in the heading (defaults to the input path)",
      alias: "t",
    },
    stylesheet: {
      type: "string",
      description: "Link an external stylesheet instead of inlining font classes",
    },
    escape: {
      type: "boolean",
      description: "Escape markup characters in words (--no-escape to disable)",
      default: true,
    },
  },
  async run({ args }) {
    try {
      const overrides: Partial<TagCloudConfig> = { escapeHtml: args.escape };
      if (args.stylesheet) overrides.stylesheetHref = args.stylesheet;
      const config = loadConfig(overrides);

      const interactive = canPrompt();

      let input: string | undefined = args.input || undefined;
      if (!input && interactive) input = await ask("Please enter your file name:");
      if (!input) {
        consola.error("No input file given");
        process.exit(1);
      }
      const text = await readDocument(input);

      const countArg: string | undefined = args.count;
      const count = countArg
        ? parseCount(countArg)
        : interactive
          ? await askCount("How many words would you like to see in the tag cloud?")
          : config.defaultCount;

      const result = generateTagCloud({ text, title: args.title ?? input, count }, config);

      let output: string | undefined = args.output || undefined;
      let folder: string | undefined = args.folder || undefined;
      if (!output && interactive) {
        output = await ask("Please enter the HTML file to write to:", "cloud.html");
        folder ??= (await ask("Please enter the folder to write to:", ".")) || undefined;
      }

      if (!output) {
        process.stdout.write(result.html);
        return;
      }

      const written = await writeTagCloud(resolveOutputPath(output, folder), result.html);
      console.log(formatGenerateSummary(result, written));
    } catch (error) {
      exitWithError(error);
    }
  },
});
