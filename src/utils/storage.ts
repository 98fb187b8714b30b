import fs from "node:fs/promises";
import path from "node:path";

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readJson(filePath: string): Promise<unknown> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content);
	} catch (err: unknown) {
		if (isMissingFile(err)) {
			return undefined;
		}
		throw err;
	}
}

export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}
