import { MediaEntry } from '../../../domain/entities/Media';
import { IExtractionStrategy, PageDocument } from '../../../domain/interfaces/IMediaExtractor';
import { getArray, getRecord } from '../json';
import { MediaEntryFactory } from '../MediaEntryFactory';
import { findPostRecords, pickPostRecord } from './postRecords';

/**
 * Reads `extended_entities.media` (falling back to `entities.media`) from
 * tweet objects in API-shaped JSON
 */
export class ExtendedEntitiesStrategy implements IExtractionStrategy {
    readonly name = 'extended-entities';

    constructor(private readonly factory: MediaEntryFactory) {}

    tryExtract(document: PageDocument): MediaEntry[] | null {
        const records = findPostRecords(document.jsonRoots, record =>
            getArray(getRecord(record, 'extended_entities'), 'media') ??
            getArray(getRecord(record, 'entities'), 'media')
        );

        const media = pickPostRecord(records, document.post.id);
        if (!media) return null;

        return this.factory.collect(media.map((entity, index) => this.factory.fromEntity(index, entity)));
    }
}
