import fs from "fs";
import chalk from "chalk";
import { getErrorMessage } from "../errors.js";
import { logger } from "../utils/logger.js";

/**
 * Plain-text record of every package and page written, appended as the run
 * progresses. The first write failure logs a warning and disables the log.
 */
export class DebugLog {
  private filePath: string | null;
  private disabled: boolean;

  constructor(filePath: string | null) {
    this.filePath = filePath;
    this.disabled = filePath === null;
  }

  getFilePath(): string | null {
    return this.disabled ? null : this.filePath;
  }

  start(totalPackages: number): void {
    this.write(`Starting processing of ${totalPackages} packages\n`, "w");
  }

  writePackage(packageName: string): void {
    const rule = "=".repeat(50);
    this.write(`\n${rule}\nPackage: ${packageName}\n${rule}\n`);
  }

  writePage(pageName: string, content: string): void {
    const rule = "-".repeat(30);
    this.write(`\n${rule}\nMan page: ${pageName}\n${rule}\n${content}\n\n`);
  }

  private write(text: string, flag: "a" | "w" = "a"): void {
    if (this.disabled || this.filePath === null) {
      return;
    }
    try {
      fs.writeFileSync(this.filePath, text, { encoding: "utf-8", flag });
    } catch (error) {
      this.disabled = true;
      logger.warn(
        chalk.yellow(
          `Debug log ${this.filePath} disabled: ${getErrorMessage(error)}`,
        ),
      );
    }
  }
}
