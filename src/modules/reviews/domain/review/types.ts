import type { Sentiment } from '../sentiment';

export interface Review {
  id: number;
  text: string;
  sentiment: Sentiment;
  createdAt: string;
}

export interface ReviewRow {
  id: number | string;
  text: string;
  sentiment: string;
  created_at: Date | string;
}
