import { execFile } from "node:child_process";
import { access, constants } from "node:fs/promises";

/**
 * Есть ли исполняемый файл: путь проверяем напрямую, имя ищем в PATH.
 */
export async function commandExists(cmd: string): Promise<boolean> {
  if (!cmd) return false;

  if (cmd.includes("/") || cmd.includes("\\")) {
    try {
      await access(cmd, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  const [file, args]: [string, string[]] = process.platform === "win32" ? ["where", [cmd]] : ["sh", ["-c", `command -v ${shellEscape(cmd)} >/dev/null 2>&1`]];
  return await new Promise<boolean>((resolve) => {
    execFile(file, args, { timeout: 2000, windowsHide: true }, (err) => {
      resolve(!err);
    });
  });
}

function shellEscape(s: string): string {
  return `'${String(s).replace(/'/g, `'"'"'`)}'`;
}
