import { UdfError, UdfErrorKind } from '../errors';
import { Reader } from '../reader';
import { AnchorVolumeDescriptorPointer, DESCRIPTOR_SIZE, ParseAnchorVolumeDescriptorPointer } from './descriptors';
import { ReadDescriptorTag, TagIdentifier } from './tag';


// Logical sector at which the anchor is always recorded
export const ANCHOR_SECTOR = 256;

// NOTE: Larger sizes must be tried first. Existing images depend on this order
export const SECTOR_SIZE_CANDIDATES: ReadonlyArray<number> = [4096, 2048, 1024, 512];


/**
 * Figures out the logical sector size of an image by looking for an anchor tag at sector 256 for each candidate size
 */
export async function DetectSectorSize(
	reader: Reader, candidates: ReadonlyArray<number> = SECTOR_SIZE_CANDIDATES
): Promise<number> {

	let size = await reader.length();

	for(let s of candidates) {
		// Need the whole probe sector to be present
		if(size < (ANCHOR_SECTOR + 1) * s) {
			continue;
		}

		let res = await ReadDescriptorTag(reader, ANCHOR_SECTOR * s);
		if(!res.ok) {
			continue;
		}

		if(res.tag.tagIdentifier === TagIdentifier.AnchorVolumeDescriptorPointer && res.tag.tagLocation === ANCHOR_SECTOR) {
			return s;
		}
	}

	throw new UdfError(
		UdfErrorKind.SectorSizeUndetectable,
		`No anchor found at sector ${ANCHOR_SECTOR} for any of the sector sizes ${candidates.join(', ')}`
	);
}

/**
 * Reads the full anchor volume descriptor pointer once the sector size is known
 */
export async function ReadAnchor(reader: Reader, sectorSize: number): Promise<AnchorVolumeDescriptorPointer> {
	reader.seek(ANCHOR_SECTOR * sectorSize);
	let buf = await reader.readBytes(DESCRIPTOR_SIZE);
	return ParseAnchorVolumeDescriptorPointer(buf);
}
