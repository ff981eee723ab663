export interface SocialPost {
  id: string;
  authorUsername: string | null;
  text: string;
}

export interface SocialSearchClient {
  searchRecent(query: string, maxResults: number): Promise<SocialPost[]>;
  isConfigured(): boolean;
}

export class SocialSearchRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SocialSearchRequestError";
  }
}
