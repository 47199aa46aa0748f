export { FileMetadataStore } from './FileMetadataStore';
export { RedisMetadataStore } from './RedisMetadataStore';
