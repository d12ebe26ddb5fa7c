#!/usr/bin/env node
import { runStoreCli } from "../store-cli.js";

process.exitCode = runStoreCli(process.argv.slice(2));
