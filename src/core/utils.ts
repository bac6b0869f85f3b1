import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export function runTimestamp(d: Date = new Date()): string {
  // YYYYMMDD_HHMMSS, local time so it lines up with the scheduler's job logs
  const yyyy = d.getFullYear();
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  const hh = String(d.getHours()).padStart(2, "0");
  const mi = String(d.getMinutes()).padStart(2, "0");
  const ss = String(d.getSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}_${hh}${mi}${ss}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, content, "utf8");
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fse.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

const SIZE_UNITS = ["B", "K", "M", "G", "T"];

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  const rounded = unit === 0 || value >= 10 ? Math.round(value).toString() : value.toFixed(1);
  return `${rounded}${SIZE_UNITS[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  if (minutes < 60) return `${minutes}m${String(rest).padStart(2, "0")}s`;
  const hours = Math.floor(minutes / 60);
  return `${hours}h${String(minutes % 60).padStart(2, "0")}m`;
}

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}
