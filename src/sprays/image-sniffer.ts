import { ResourceError } from "../core/errors/errors";

export type ImageFormat = "png" | "jpeg" | "placeholder";

/**
 * What the default decoder knows about an image: enough to size a decal.
 * The renderer uploads `bytes` itself.
 */
export interface SprayImage {
	format: ImageFormat;
	width: number;
	height: number;
	bytes: Uint8Array;
}

/** Size of the image shown for an empty asset */
export const PLACEHOLDER_SIZE = 2;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const PNG_IHDR = [0x49, 0x48, 0x44, 0x52];

/**
 * Identifies a PNG or JPEG image and reads its dimensions from the header.
 * Zero-length input yields a 2x2 placeholder.
 *
 * @throws ResourceError for anything else
 */
export function sniffImage(bytes: Uint8Array): SprayImage {
	if (bytes.byteLength === 0) {
		return { format: "placeholder", width: PLACEHOLDER_SIZE, height: PLACEHOLDER_SIZE, bytes };
	}

	if (startsWith(bytes, PNG_SIGNATURE)) return sniffPng(bytes);
	if (bytes.byteLength >= 2 && bytes[0] === 0xff && bytes[1] === 0xd8) return sniffJpeg(bytes);

	throw new ResourceError(`Unsupported image format (${bytes.byteLength} bytes)`);
}

function sniffPng(bytes: Uint8Array): SprayImage {
	// signature, IHDR length, "IHDR", width, height
	if (bytes.byteLength < 24 || !startsWith(bytes.subarray(12), PNG_IHDR)) {
		throw new ResourceError("PNG header is truncated");
	}

	const view = toView(bytes);
	return { format: "png", width: view.getUint32(16), height: view.getUint32(20), bytes };
}

function sniffJpeg(bytes: Uint8Array): SprayImage {
	const view = toView(bytes);
	let offset = 2;

	while (offset + 4 <= bytes.byteLength) {
		if (bytes[offset] !== 0xff) {
			throw new ResourceError(`JPEG marker expected at ${offset}`);
		}

		const marker = bytes[offset + 1];
		if (marker === 0xff) {
			offset++;
			continue;
		}
		// standalone markers carry no length
		if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd9)) {
			offset += 2;
			continue;
		}

		if (isStartOfFrame(marker)) {
			if (offset + 9 > bytes.byteLength) break;
			return {
				format: "jpeg",
				height: view.getUint16(offset + 5),
				width: view.getUint16(offset + 7),
				bytes,
			};
		}

		offset += 2 + view.getUint16(offset + 2);
	}

	throw new ResourceError("JPEG has no frame header");
}

function isStartOfFrame(marker: number): boolean {
	return marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
}

function startsWith(bytes: Uint8Array, prefix: number[]): boolean {
	return bytes.byteLength >= prefix.length && prefix.every((byte, i) => bytes[i] === byte);
}

function toView(bytes: Uint8Array): DataView {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
