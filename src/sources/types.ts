export interface Candidate {
  name: string;
  url: string;
  description: string;
  source: "trending" | "search";
  metadata: CandidateMetadata;
}

export interface CandidateMetadata {
  stars?: number;
  language?: string;
  topics?: string[];
}
