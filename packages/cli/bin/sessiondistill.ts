#!/usr/bin/env node

import { createRequire } from "node:module";
import { createProgram } from "../src/index.js";

const require = createRequire(import.meta.url);
const { version }: { version: string } = require("../../package.json");

await createProgram(version).parseAsync();
