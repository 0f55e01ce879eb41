/**
 * File Utilities
 *
 * Durable replace-by-rename writes. Readers see either the old file or the
 * complete new one, never a partial write.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';

/**
 * Unique sibling path for staging a write
 */
export function stagingPath(target: string): string {
	return `${target}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
}

/**
 * Flush a directory entry so a completed rename survives a crash.
 * Some platforms cannot open directories; that is not an error there.
 */
export function fsyncDirectory(dir: string): void {
	let fd: number | undefined;
	try {
		fd = fs.openSync(dir, 'r');
		fs.fsyncSync(fd);
	} catch (error) {
		const code = error instanceof Error && 'code' in error ? error.code : undefined;
		if (code !== 'EISDIR' && code !== 'EPERM' && code !== 'EINVAL') {
			throw error;
		}
	} finally {
		if (fd !== undefined) {
			fs.closeSync(fd);
		}
	}
}

/**
 * fsync an existing file by path
 */
export function fsyncFile(filePath: string): void {
	const fd = fs.openSync(filePath, 'r+');
	try {
		fs.fsyncSync(fd);
	} finally {
		fs.closeSync(fd);
	}
}

/**
 * Write data to a staging file, fsync it, then rename it over the target
 *
 * Throws on failure; the staging file is removed and the target untouched.
 */
export function writeFileAtomic(target: string, data: string | Buffer): void {
	const dir = path.dirname(target);
	fs.mkdirSync(dir, { recursive: true });

	const tmp = stagingPath(target);
	try {
		const fd = fs.openSync(tmp, 'w');
		try {
			fs.writeFileSync(fd, data);
			fs.fsyncSync(fd);
		} finally {
			fs.closeSync(fd);
		}
		fs.renameSync(tmp, target);
	} catch (error) {
		fs.rmSync(tmp, { force: true });
		throw error;
	}

	fsyncDirectory(dir);
}

/**
 * Rename a fully written file into place and flush the directory
 */
export function publishFile(staged: string, target: string): void {
	fs.renameSync(staged, target);
	fsyncDirectory(path.dirname(target));
}
