import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const PROMPTS_DIR = path.dirname(fileURLToPath(import.meta.url));

const cache = new Map<string, string>();

export function loadPromptTemplate(name: string): string {
	let template = cache.get(name);
	if (template === undefined) {
		template = fs.readFileSync(path.join(PROMPTS_DIR, `${name}.md`), "utf-8");
		cache.set(name, template);
	}
	return template;
}

/** Replaces every {{key}} placeholder; unknown placeholders are left as they are. */
export function renderPrompt(template: string, values: Record<string, string>): string {
	return template.replace(/\{\{\s*([\w.]+)\s*\}\}/g, (placeholder, key: string) => values[key] ?? placeholder);
}
