import { defineCommand } from "citty";

import { loadConfig, parseCount } from "../../config/defaults.ts";
import { topWords } from "../../core/generator.ts";
import { readDocument } from "../../io/document.ts";
import { exitWithError } from "../errors.ts";
import { formatTopWords } from "../format.ts";

export const topCommand = defineCommand({
  meta: {
    name: "top",
    description: "List the most frequent words with their counts and font sizes",
  },
  args: {
    input: {
      type: "positional",
      description: "Text document to read",
      required: true,
    },
    count: {
      type: "string",
      description: "Number of words to list",
      alias: "n",
    },
  },
  async run({ args }) {
    try {
      const config = loadConfig();
      const countArg: string | undefined = args.count;
      const count = countArg ? parseCount(countArg) : config.defaultCount;

      const text = await readDocument(args.input);
      console.log(formatTopWords(topWords(text, count, config), args.input));
    } catch (error) {
      exitWithError(error);
    }
  },
});
