import { describe, it, expect } from '@jest/globals';
import { DownloadReport, DownloadResult } from './DownloadResult';
import { MediaEntry, MediaKind, MediaVariant } from './Media';
import { PostReference } from '../value-objects/PostReference';
import { TransferError, WriteError } from '../../shared/errors/AppError';

const post = PostReference.parse('https://x.com/sample_user/status/1');

function photo(index: number): MediaEntry {
    const source: MediaVariant = { url: `https://pbs.twimg.com/media/P${index}.jpg?name=orig` };
    return new MediaEntry(index, MediaKind.PHOTO, [source], source);
}

function report(results: DownloadResult[]): DownloadReport {
    const now = new Date();
    return new DownloadReport(post, results, { duration: 0, startedAt: now, completedAt: now, outputDir: '/tmp/out' });
}

describe('DownloadReport', () => {
    it('should treat a post without media as a success', () => {
        const empty = report([]);

        expect(empty.paths).toEqual([]);
        expect(empty.success).toBe(true);
        expect(empty.getSuccessRate()).toBe(0);
    });

    it('should list paths in order and account for failures', () => {
        const results = [
            DownloadResult.success(photo(0), { path: '/tmp/out/a.jpg', filename: 'a.jpg', size: 10 }),
            DownloadResult.failure(photo(1), new TransferError('https://pbs.twimg.com/media/P1.jpg?name=orig', 'gone', 404)),
            DownloadResult.success(photo(2), { path: '/tmp/out/b.jpg', filename: 'b.jpg', size: 5 })
        ];
        const partial = report(results);

        expect(partial.paths).toEqual(['/tmp/out/a.jpg', '/tmp/out/b.jpg']);
        expect(partial.totalSize).toBe(15);
        expect(partial.success).toBe(true);
        expect(partial.isPartialSuccess()).toBe(true);
        expect(partial.failures).toHaveLength(1);
        expect(partial.failures[0].error).toMatchObject({
            code: 'TRANSFER_ERROR',
            stage: 'download',
            status: 404,
            url: 'https://pbs.twimg.com/media/P1.jpg?name=orig'
        });
    });

    it('should fail when every entry failed', () => {
        const failed = report([DownloadResult.failure(photo(0), new WriteError('/tmp/out/a.jpg', 'disk full'))]);

        expect(failed.success).toBe(false);
        expect(failed.isPartialSuccess()).toBe(false);
        expect(failed.failures[0].error?.status).toBeUndefined();
    });
});
