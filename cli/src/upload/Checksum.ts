import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

async function digestFile(algorithm: "sha1" | "sha256", path: string): Promise<{ size: number; hashHex: string }> {
	const hash = createHash(algorithm);
	let size = 0;
	for await (const chunk of createReadStream(path)) {
		const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += bytes.length;
		hash.update(bytes);
	}
	return { size, hashHex: hash.digest("hex") };
}

/**
 * SHA-1 hex of a file, the checksum the remote store deduplicates on.
 */
export async function sha1HexFile(path: string): Promise<string> {
	return (await digestFile("sha1", path)).hashHex;
}

/**
 * SHA-256 hex and byte size of a file, used to compare local copies.
 */
export function sha256File(path: string): Promise<{ size: number; hashHex: string }> {
	return digestFile("sha256", path);
}
