import chalk from "chalk";
import type { LifecycleState } from "../core/coordinator.js";

export function stateBadge(state: LifecycleState): string {
  switch (state) {
    case "uninitialized": return chalk.gray("○ idle   ");
    case "initialized": return chalk.blue("◌ ready  ");
    case "running": return chalk.yellow("◐ running");
    case "done": return chalk.green("● done   ");
  }
}

export function successMsg(msg: string): string {
  return chalk.green(`  ✓ ${msg}`);
}

export function warnMsg(msg: string): string {
  return chalk.yellow(`  ⚠ ${msg}`);
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

export function timestamp(date = new Date()): string {
  return date.toLocaleTimeString("en-GB", { hour12: false });
}
