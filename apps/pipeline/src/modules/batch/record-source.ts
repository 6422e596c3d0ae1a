import { readdir, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import type { MatchId, MatchRecord } from "@crease/shared-types";
import { MalformedRecordError, RecordNotFoundError } from "../../errors";
import { decodeMatchRecord } from "../matches/match-schema";

/**
 * Supplier of raw match records
 */
export interface RecordSource {
	listMatches(): Promise<MatchId[]>;
	/**
	 * @throws RecordNotFoundError | MalformedRecordError
	 */
	readMatch(matchId: MatchId): Promise<MatchRecord>;
}

const MATCH_FILE_EXTENSION = ".json";

const errorCode = (error: unknown): unknown =>
	error instanceof Error && "code" in error ? error.code : undefined;

/**
 * One `<matchId>.json` file per match in a single directory
 */
export class FileSystemRecordSource implements RecordSource {
	constructor(private readonly directory: string) {}

	async listMatches(): Promise<MatchId[]> {
		let entries: string[];
		try {
			entries = await readdir(this.directory);
		} catch (error) {
			if (errorCode(error) === "ENOENT") return [];
			throw error;
		}
		return entries
			.filter((name) => name.toLowerCase().endsWith(MATCH_FILE_EXTENSION))
			.map((name) => basename(name, MATCH_FILE_EXTENSION))
			.sort((a, b) => a.localeCompare(b, "en", { numeric: true }));
	}

	async readMatch(matchId: MatchId): Promise<MatchRecord> {
		const path = join(this.directory, `${matchId}${MATCH_FILE_EXTENSION}`);
		let text: string;
		try {
			text = await readFile(path, "utf-8");
		} catch (error) {
			if (errorCode(error) === "ENOENT") {
				throw new RecordNotFoundError(`Match file not found: ${path}`, matchId);
			}
			const reason = error instanceof Error ? error.message : String(error);
			throw new MalformedRecordError(`Match file unreadable: ${path}`, matchId, [reason]);
		}
		return decodeMatchRecord(text, matchId);
	}
}
