import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { TextDecoder } from 'node:util';
import { z } from 'zod';
import type { DictionaryRepository } from '../../application/ports/dictionary-repository';
import type { OutputSink } from '../../application/ports/output-sink';
import { createDefaultDictionary } from '../../domain/constants/default-dictionary';
import { formatMessage } from '../../domain/constants/messages';
import type { DictionarySection, RtlDictionary } from '../../domain/entities/rtl-dictionary';
import { DictionaryFileError } from '../error/error-handler';
import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';

// Validates without rebuilding: z.record would copy the section and skip `__proto__`.
const sectionSchema = z.custom<Record<string, string>>(isStringSection, {
	message: 'Expected an object mapping strings to strings',
});

export const dictionaryFileSchema = z.object({
	Prefixes: sectionSchema,
	Suffixes: sectionSchema,
});

export interface JsonDictionaryRepositoryOptions {
	readonly fileName: string;
	readonly sink: OutputSink;
	readonly logger: ILogger;
}

/**
 * Parses raw dictionary file bytes.
 * Invalid UTF-8, empty content, invalid JSON and JSON of the wrong shape are all failures.
 * A byte order mark is kept, so it fails the JSON parse.
 */
export function parseDictionary(content: Uint8Array): Result<RtlDictionary> {
	const text = decodeUtf8(content);
	if (!text.success) {
		return Result.failure(text.error);
	}
	if (text.value.trim().length === 0) {
		return Result.failure(new Error('Dictionary file is empty'));
	}

	const json = parseJson(text.value);
	if (!json.success) {
		return Result.failure(json.error);
	}

	const parsed = dictionaryFileSchema.safeParse(json.value);
	if (!parsed.success) {
		return Result.failure(new Error(`Unexpected dictionary layout: ${parsed.error.issues[0]?.message ?? 'invalid'}`));
	}
	return Result.success({
		Prefixes: copySection(parsed.data.Prefixes),
		Suffixes: copySection(parsed.data.Suffixes),
	});
}

/**
 * Reads `rtl_dictionary.json` (or the configured name) from a directory on disk
 */
export class JsonDictionaryRepository implements DictionaryRepository {
	private readonly fileName: string;
	private readonly sink: OutputSink;
	private readonly logger: ILogger;

	constructor({ fileName, sink, logger }: JsonDictionaryRepositoryOptions) {
		this.fileName = fileName;
		this.sink = sink;
		this.logger = logger;
	}

	/**
	 * @throws DictionaryFileError when the file cannot be read
	 */
	load(directory: string): RtlDictionary {
		const path = join(directory, this.fileName);
		const content = this.readContent(path);
		this.sink.write(formatMessage('fileReadAttempt', path));

		return parseDictionary(content)
			.onSuccess((dictionary) => {
				this.logger.debug('Dictionary loaded', {
					path,
					prefixes: Object.keys(dictionary.Prefixes).length,
					suffixes: Object.keys(dictionary.Suffixes).length,
				});
			})
			.unwrapOr((error) => {
				this.logger.debug('Falling back to the built-in dictionary', { path, reason: error.message });
				this.sink.write(formatMessage('fileEmpty', path));
				return createDefaultDictionary();
			});
	}

	private readContent(path: string): Uint8Array {
		try {
			return readFileSync(path);
		} catch (error) {
			throw new DictionaryFileError(path, error);
		}
	}
}

type Parsed<T> = { success: true; value: T } | { success: false; error: Error };

function decodeUtf8(content: Uint8Array): Parsed<string> {
	try {
		return { success: true, value: new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(content) };
	} catch (error) {
		return { success: false, error: toError(error) };
	}
}

function parseJson(text: string): Parsed<unknown> {
	try {
		return { success: true, value: JSON.parse(text) };
	} catch (error) {
		return { success: false, error: toError(error) };
	}
}

function isStringSection(value: unknown): value is Record<string, string> {
	return (
		typeof value === 'object' &&
		value !== null &&
		!Array.isArray(value) &&
		Object.values(value).every((explanation) => typeof explanation === 'string')
	);
}

// Object.fromEntries defines own data properties, `__proto__` included.
function copySection(section: Record<string, string>): DictionarySection {
	return Object.fromEntries(Object.entries(section));
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
