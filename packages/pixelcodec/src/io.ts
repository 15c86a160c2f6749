import { randomBytes } from 'node:crypto'
import { open, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { createChildLogger } from './logger'

const log = createChildLogger({ module: 'io' })

function tempPathFor(path: string): string {
	return join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`)
}

/**
 * Write bytes so the target is either untouched or complete: a sibling temp
 * file is written, synced and renamed over it
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
	const temp = tempPathFor(path)
	try {
		const handle = await open(temp, 'w')
		try {
			await handle.writeFile(data)
			await handle.sync()
		} finally {
			await handle.close()
		}
		await rename(temp, path)
		log.debug({ path, bytes: data.length }, 'wrote file')
	} catch (error) {
		await rm(temp, { force: true }).catch((cleanupError: unknown) => {
			log.warn({ err: cleanupError, temp }, 'could not remove temp file')
		})
		throw error
	}
}
