export interface ServiceDescriptor {
  readonly name: string;
  readonly baseUrl: string;
  readonly healthPath: string;
  readonly timeoutMs: number;
  readonly retries: number;
  readonly breakerThreshold: number;
}

export interface RouteRule {
  prefix: string;
  service: string;
  // Removed from the incoming path before it is appended to the base URL
  stripPrefix?: string;
}

export type ServiceGroups = Record<string, string[]>;
