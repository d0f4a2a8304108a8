import type { HttpOptions } from '../http.js';
import type { ConfigMap, GroupId, RawItem } from '../types.js';

export interface ProviderSecrets {
  samApiKey?: string;
  contractsFinderApiKey?: string;
}

export interface ProviderContext {
  /** Group pattern; providers may use it to narrow what they fetch. */
  regex: RegExp | null;
  config: ConfigMap;
  timeZone: string;
  secrets: ProviderSecrets;
  http: HttpOptions;
  now: Date;
}

/**
 * A source of raw candidates for one group. Throws (usually a FetchError)
 * when the source cannot be read.
 */
export interface Provider {
  readonly name: string;
  readonly group: GroupId;
  /** Base used to absolutize relative links stored for this source. */
  readonly baseUrl: string;
  /** Page an operator can open when the provider misbehaves. */
  readonly urlHint: string;
  fetch(ctx: ProviderContext): Promise<RawItem[]>;
}

export interface ProviderMeta {
  name: string;
  group: GroupId;
  agency: string;
  region: string;
}
