import fs from "node:fs/promises";
import path from "node:path";

export type JsonRead<T> =
	| { status: "ok"; value: T }
	| { status: "missing" }
	| { status: "corrupt"; error: unknown };

/** Reads and parses a JSON file without deciding what a missing or broken file means. */
export async function readJsonFile(filePath: string): Promise<JsonRead<unknown>> {
	let content: string;
	try {
		content = await fs.readFile(filePath, "utf8");
	} catch (err: unknown) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return { status: "missing" };
		}
		throw err;
	}

	try {
		return { status: "ok", value: JSON.parse(content) };
	} catch (error) {
		return { status: "corrupt", error };
	}
}

let writeSeq = 0;

// temp file + rename: a crash mid-write leaves the previous file intact.
// Each write gets its own temp file so overlapping writes never share one.
export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	writeSeq += 1;
	const tempPath = `${filePath}.${process.pid}.${writeSeq}.tmp`;
	await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tempPath, filePath);
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}
