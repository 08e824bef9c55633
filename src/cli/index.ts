#!/usr/bin/env tsx
import { defineCommand, runMain } from "citty";

import pkg from "../../package.json";
import { generateCommand } from "./commands/generate.ts";
import { topCommand } from "./commands/top.ts";

const main = defineCommand({
  meta: {
    name: "tagcloud",
    version: pkg.version,
    description: "Word-frequency tag clouds from plain text",
  },
  subCommands: {
    generate: generateCommand,
    top: topCommand,
  },
});

void runMain(main);
