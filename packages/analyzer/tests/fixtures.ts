import { readFileSync } from "node:fs";

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");
}

/** Three rooms joined by two corridors, 12 lines of 14 tiles */
export const ARENA_MAP = readFixture("arena_map.txt");
export const ARENA_GENOME = readFixture("arena_AB.txt");
