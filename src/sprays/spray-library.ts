import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { ResourceError, describeError } from "../core/errors/errors";
import { Logger } from "../core/logger/logger";
import { MAX_ASSET_SIZE } from "../protocol/packets/packets";

/** Extensions the library picks up, lowercase and without the dot */
export const SUPPORTED_EXTENSIONS = ["png", "jpg", "jpeg"] as const;

/** Files loaded at most */
export const MAX_SPRAY_FILES = 5;

/** Characters kept by {@link SprayFile.shortName} */
export const SHORT_NAME_LENGTH = 8;

/**
 * A spray image loaded from disk.
 */
export class SprayFile {
	constructor(
		readonly name: string,
		readonly bytes: Uint8Array
	) {}

	get size(): number {
		return this.bytes.byteLength;
	}

	/** Name cut to `length` characters, with "..." when it was longer */
	shortName(length: number = SHORT_NAME_LENGTH): string {
		return this.name.length > length ? `${this.name.slice(0, length)}...` : this.name;
	}

	/** True if the image is too big to be sent */
	exceedsLimit(limit: number = MAX_ASSET_SIZE): boolean {
		return this.bytes.byteLength > limit;
	}
}

export interface SprayLibraryConfig {
	/** Directory holding the spray images */
	directory: string;

	/** Files loaded at most (default: 5) */
	maxFiles?: number;

	logger?: Logger;
}

/**
 * @description
 * Local spray images, read from one directory.
 *
 * `load` picks the first `maxFiles` supported images in name order; `select`
 * makes one of them the current spray.
 *
 * @example
 * ```ts
 * const library = new SprayLibrary({ directory: "./sprays" });
 * await library.load();
 * library.select("cat.png");
 * library.current?.shortName(); // "cat.png"
 * ```
 */
export class SprayLibrary {
	private readonly directory: string;
	private readonly maxFiles: number;
	private readonly logger: Logger;
	private loaded: SprayFile[] = [];
	private selected: SprayFile | null = null;

	constructor(config: SprayLibraryConfig) {
		this.directory = config.directory;
		this.maxFiles = config.maxFiles ?? MAX_SPRAY_FILES;
		this.logger = config.logger ?? new Logger("SprayLibrary");
	}

	get files(): readonly SprayFile[] {
		return this.loaded;
	}

	/** The selected spray, or null if none was chosen */
	get current(): SprayFile | null {
		return this.selected;
	}

	/**
	 * (Re)reads the directory. The selection survives if its file is still there.
	 *
	 * @throws ResourceError if the directory or one of the picked files cannot be read
	 */
	async load(): Promise<readonly SprayFile[]> {
		let names: string[];
		try {
			const entries = await readdir(this.directory, { withFileTypes: true });
			names = entries.filter((entry) => entry.isFile() && isSupported(entry.name)).map((entry) => entry.name);
		} catch (error) {
			throw new ResourceError(`Cannot list sprays in ${this.directory}: ${describeError(error)}`, { cause: error });
		}

		names.sort();
		if (names.length > this.maxFiles) {
			this.logger.warn(`Found ${names.length} sprays, loading the first ${this.maxFiles}`);
		}

		const files: SprayFile[] = [];
		for (const name of names.slice(0, this.maxFiles)) {
			files.push(new SprayFile(name, await this.read(name)));
		}

		this.loaded = files;
		const selectedName = this.selected?.name;
		this.selected = files.find((file) => file.name === selectedName) ?? null;

		this.logger.debug(`Loaded ${files.length} sprays: ${files.map((file) => file.name).join(", ")}`);
		return files;
	}

	/**
	 * Makes the named file the current spray.
	 * @returns false (and clears the selection) if no loaded file has that name
	 */
	select(name: string): boolean {
		this.selected = this.loaded.find((file) => file.name === name) ?? null;
		return this.selected !== null;
	}

	private async read(name: string): Promise<Uint8Array> {
		try {
			return new Uint8Array(await readFile(join(this.directory, name)));
		} catch (error) {
			throw new ResourceError(`Cannot read spray ${name}: ${describeError(error)}`, { cause: error });
		}
	}
}

function isSupported(name: string): boolean {
	const extension = extname(name).slice(1).toLowerCase();
	return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}
