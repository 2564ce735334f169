/**
 * CHANGE: Centralized re-exports of the Node built-ins used by the shell
 * WHY: One import block for fs/path/readline/url across shell modules
 *
 * Invariant: re-export through constants, since node:path and node:fs use `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";
import * as readlineNS from "node:readline";

export { ReadStream as TTYReadStream } from "node:tty";
export { fileURLToPath } from "node:url";

export const fs = fsNS;
export const path = pathNS;
export const readline = readlineNS;
