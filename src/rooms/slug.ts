import { InvalidRoomIdError } from '../core/errors.js'

export function slugify(raw: string): string {
    return raw
        .trim()
        .toLowerCase()
        .replace(/[\s_]+/g, '-')
        .replace(/[^a-z0-9-]/g, '')
        .replace(/-{2,}/g, '-')
        .replace(/^-+|-+$/g, '')
}

/** Normalized room id; throws when nothing usable remains. */
export function normalizeRoomId(raw: string): string {
    const id = slugify(raw)
    if (!id) throw new InvalidRoomIdError(raw)
    return id
}
