#!/usr/bin/env node
import { Command } from "commander";
import { registerSolverCli } from "./cli/solver-cli.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("leedfit")
    .description("LEED R-factor evaluation through the satl1/satl2 solver pair");
  registerSolverCli(program);
  return program;
}

await buildProgram().parseAsync(process.argv);
