import { fileURLToPath } from "node:url";
import path from "node:path";
import { readFile } from "node:fs/promises";
import handlebars from "handlebars";

const templateRoot = fileURLToPath(new URL("../templates", import.meta.url));

const renderer = handlebars.create();

// TOML basic strings share JSON's escaping rules for the characters paths use.
renderer.registerHelper("toml", (value: unknown) =>
  JSON.stringify(String(value ?? ""))
);

export async function renderTemplate(
  relativePath: string,
  context: Record<string, unknown>
): Promise<string> {
  const source = await readFile(path.join(templateRoot, relativePath), "utf8");
  const template = renderer.compile(source, { noEscape: true });
  return template(context);
}
