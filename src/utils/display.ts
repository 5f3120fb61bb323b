import chalk from "chalk";
import type { FreshnessState } from "../core/fingerprint.js";

export function freshnessIcon(state: FreshnessState): string {
  switch (state) {
    case "fresh": return chalk.green("✓ fresh  ");
    case "stale": return chalk.yellow("⚠ changed");
    case "missing": return chalk.cyan("+ new    ");
  }
}

export function successMsg(msg: string): string {
  return chalk.green(`  ✓ ${msg}`);
}

export function errorMsg(msg: string): string {
  return chalk.red(`  ✗ ${msg}`);
}

export function heading(msg: string): string {
  return chalk.bold(msg);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

export function timestamp(date: Date = new Date()): string {
  return date.toLocaleTimeString("en-GB", { hour12: false });
}
