import fs from 'fs-extra';
import { UdfError, UdfErrorKind } from './errors';


/**
 * Generic interface for random access reads from a disc image
 */
export abstract class Reader {

	/**
	 * Should clean up the reader and make it unusable
	 */
	abstract close(): Promise<void>;

	/**
	 * Retrieves the current position of the reader
	 */
	abstract pos(): number;

	/**
	 * Gets the total size of the reader in bytes
	 */
	abstract length(): Promise<number>;

	/**
	 * Changes the absolute position of the reader
	 */
	abstract seek(pos: number): void;

	/**
	 * Advances the current reader position by this amount
	 */
	skip(count: number): void {
		this.seek(this.pos() + count);
	}

	/**
	 * Should get a new reader which is independently seekable and optionally follows the given positioning constraints
	 */
	abstract slice(start?: number, end?: number): Reader;

	/**
	 * Reads up to the given number of bytes at the current position. Fewer bytes are only returned at the end of the reader
	 */
	abstract readSome(len: number): Promise<Buffer>;

	/**
	 * Gets exactly the given number of bytes at the current position
	 */
	async readBytes(len: number): Promise<Buffer> {
		let start = this.pos();
		let buf = await this.readSome(len);
		if(buf.length !== len) {
			throw new UdfError(
				UdfErrorKind.TruncatedBuffer,
				`Wanted ${len} bytes at offset ${start} but only ${buf.length} are available`
			);
		}

		return buf;
	}

}


interface ReferenceCountedNumber {
	val: number;
	nrefs: number;
}


/**
 * Reads from an image file on disk. Slices share the same file descriptor which is only closed once every slice is closed
 */
export class FileReader extends Reader {

	private _fd: ReferenceCountedNumber;
	private _pos: number;

	private _start: number;
	private _end: number;

	static async Create(filename: string) {
		let fd = await fs.open(filename, 'r');
		let stat = await fs.fstat(fd);
		return new FileReader({ val: fd, nrefs: 1 }, 0, stat.size);
	}

	private constructor(fd: ReferenceCountedNumber, start: number, end: number) {
		super();
		this._pos = start;
		this._fd = fd;
		this._start = start;
		this._end = end;
	}

	async length() {
		return this._end - this._start;
	}

	pos() {
		return this._pos - this._start;
	}

	seek(pos: number) {
		this._pos = pos + this._start;
	}

	slice(start?: number, end?: number) {
		if(this._fd.val < 0) {
			throw new Error('Slicing a closed reader');
		}

		this._fd.nrefs++;
		return new FileReader(
			this._fd,
			this._start + (start || 0),
			end !== undefined ? Math.min(this._start + end, this._end) : this._end
		);
	}

	async readSome(n: number): Promise<Buffer> {
		let avail = Math.max(0, Math.min(n, this._end - this._pos));
		let buf = Buffer.alloc(avail);
		if(avail === 0) {
			return buf;
		}

		let res = await fs.read(this._fd.val, buf, 0, avail, this._pos);

		this._pos += res.bytesRead;
		return buf.subarray(0, res.bytesRead);
	}

	async close() {
		this._fd.nrefs--;
		if(this._fd.nrefs === 0) {
			await fs.close(this._fd.val);
			this._fd.val = -1;
		}
	}

}


/**
 * Reads from an image that is already entirely in memory
 */
export class BufferReader extends Reader {
	private _buf: Buffer;
	private _pos = 0;

	constructor(buf: Buffer) {
		super();
		this._buf = buf;
	}

	// Nicely handled by the garbage collector
	async close() { }

	pos() {
		return this._pos;
	}

	seek(n: number) {
		this._pos = n;
	}

	slice(start?: number, end?: number) {
		// NOTE: subarray shares memory with the original so this is not a copy
		return new BufferReader(this._buf.subarray(start || 0, end));
	}

	async length() {
		return this._buf.length;
	}

	async readSome(n: number) {
		let start = Math.min(this._pos, this._buf.length);
		let arr = this._buf.subarray(start, Math.min(start + n, this._buf.length));
		this._pos += arr.length;
		return arr;
	}

}
