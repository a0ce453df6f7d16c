/**
 * Pure formatting helpers for the status view
 */

import type { Condition } from "../types/domain";

export type TextColor = "green" | "red" | "yellow";

/**
 * Color for a condition status. Degraded-style conditions are healthy when
 * False, so callers pass `inverted` for those.
 */
export function colorFor(status: string, inverted = false): { color?: TextColor; dimColor?: boolean } {
  const v = (status || "").toLowerCase();
  if (v === "true") return { color: inverted ? "red" : "green" };
  if (v === "false") return { color: inverted ? "green" : "red" };
  if (v === "unknown" || v === "") return { dimColor: true };
  return { color: "yellow" };
}

// Condition types whose healthy state is False.
const NEGATIVE_CONDITIONS = new Set(["Degraded", "ClusterVersionFailing"]);

export function isNegativeCondition(type: string): boolean {
  return NEGATIVE_CONDITIONS.has(type);
}

/**
 * "Time since" in the compact form used by the sync table, e.g. `5m ago`
 */
export function humanizeAgo(date: Date | null, now: Date = new Date()): string {
  if (!date) return "(unknown)";
  const s = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
  if (s < 60) return `${s}s ago`;
  const m = Math.floor(s / 60);
  if (m < 60) return `${m}m ago`;
  const h = Math.floor(m / 60);
  if (h < 24) return `${h}h ago`;
  return `${Math.floor(h / 24)}d ago`;
}

export function boolStatus(b: boolean): string {
  return b ? "True" : "False";
}

export function readinessLabel(ready: boolean | null): string {
  if (ready === null) return "Unknown";
  return ready ? "Ready" : "Not Ready";
}

/**
 * Whole days until `date`, rounded up; negative once it has passed
 */
export function daysRemaining(date: Date, now: Date = new Date()): number {
  return Math.ceil((date.getTime() - now.getTime()) / 86_400_000);
}

// YYYY-MM-DD in UTC
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Lines to show for a condition: the message, or the reason when there is
 * none. Continuation lines are trimmed and blank ones dropped.
 */
export function conditionLines(condition: Condition): string[] {
  const text = condition.message || condition.reason;
  const [first, ...rest] = text.split("\n");
  return [first, ...rest.map((l) => l.trim()).filter((l) => l.length > 0)];
}

export function nodePoolHeading(name: string, replicas: number, version: string): string {
  const details: string[] = [];
  if (replicas > 0) details.push(`${replicas} replicas`);
  if (version) details.push(`v${version}`);
  return details.length > 0 ? `NODEPOOL: ${name} (${details.join(", ")})` : `NODEPOOL: ${name}`;
}
