#!/usr/bin/env node
import { Command } from "commander";
import { createDriftCli } from "./cli.js";
import { VERSION } from "./version.js";

const program = new Command();
program
  .name("driftlens")
  .description("Detect drift between Terraform state and a live cloud snapshot")
  .version(VERSION);

createDriftCli()(program);

await program.parseAsync(process.argv);
