#!/usr/bin/env node
import { SpellSuggestCLI } from "./cli.js";

process.exitCode = await new SpellSuggestCLI().run(process.argv.slice(2));
