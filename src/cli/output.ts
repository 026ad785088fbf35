export const RULE = "=".repeat(60);

export function print(line = ""): void {
  process.stdout.write(`${line}\n`);
}
