import type { TrackMetadata } from '../metadata';

export interface IMetadataStore {
  get(sourceId: string): Promise<TrackMetadata | null>;
  put(sourceId: string, record: TrackMetadata): Promise<void>;
  remove(sourceId: string): Promise<boolean>;
}
