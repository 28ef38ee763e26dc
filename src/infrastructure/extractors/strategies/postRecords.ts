import { JsonRecord, getString, walkRecords } from '../json';

export interface PostRecord<T> {
    id?: string;
    value: T;
}

/**
 * Find every object under roots that `read` accepts, paired with the
 * post ID it carries (`id_str`, or `rest_id` on GraphQL results).
 */
export function findPostRecords<T>(
    roots: readonly unknown[],
    read: (record: JsonRecord) => T | undefined
): PostRecord<T>[] {
    const found: PostRecord<T>[] = [];
    for (const root of roots) {
        walkRecords(root, record => {
            const value = read(record);
            if (value !== undefined) {
                found.push({ id: getString(record, 'id_str') ?? getString(record, 'rest_id'), value });
            }
        });
    }
    return found;
}

/**
 * The record belonging to postId. Records of quoted or retweeted posts
 * carry other IDs and are never chosen; an anonymous record is only
 * used when no record has an ID at all.
 */
export function pickPostRecord<T>(records: readonly PostRecord<T>[], postId: string): T | undefined {
    const own = records.find(record => record.id === postId);
    if (own) return own.value;

    if (records.length > 0 && records.every(record => record.id === undefined)) {
        return records[0].value;
    }
    return undefined;
}
