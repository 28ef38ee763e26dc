// Entities
export * from './entities/Media';
export * from './entities/DownloadResult';

// Interfaces
export * from './interfaces/IHttpClient';
export * from './interfaces/IPageFetcher';
export * from './interfaces/IMediaExtractor';
export * from './interfaces/IMediaDownloader';
export * from './interfaces/IFileStorage';

// Value Objects
export * from './value-objects/PostReference';
export * from './value-objects/Filename';
