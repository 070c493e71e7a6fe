// Entities
export * from './entities/DownloaderConfig';
export * from './entities/DownloadReport';

// Interfaces
export * from './interfaces/IHttpClient';
export * from './interfaces/ILinkExtractor';
export * from './interfaces/IFileStorage';

// Value Objects
export * from './value-objects/PageUrl';
export * from './value-objects/Filename';
