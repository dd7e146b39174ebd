/**
 * Styled output helpers
 */

import { readFileSync } from "node:fs";
import * as path from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";

export { color };

function readVersion(): string {
  // src/cli/ui and dist/cli/ui both sit three levels below package.json
  const pkgPath = path.join(__dirname, "..", "..", "..", "package.json");
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION = readVersion();

const LOGO = String.raw`
            __ _                        
  _ __ __ _/ _| |_ ___ _ __   __ _ _ __  
 | '__/ _' | |_| __/ __| '_ \ / _' | '_ \ 
 | | | (_| |  _| |_\__ \ | | | (_| | |_) |
 |_|  \__,_|_|  \__|___/_| |_|\__,_| .__/ 
                                   |_|    
`;

/**
 * Display the logo and version for a command
 */
export function banner(command: string): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("raftsnap")} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
}

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(color.red(message));
export const message = (message: string) => p.log.message(message);
