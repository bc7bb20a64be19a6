#!/usr/bin/env node
import { createRequire } from "node:module";
import { createCli } from "./cli/program.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

void createCli(pkg.version).runExit(process.argv.slice(2));
