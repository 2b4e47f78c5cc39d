// Sentiment scoring
// The triage engine only consumes a score in [-1, 1]; scorers are swappable

import vader from 'vader-sentiment';

export interface SentimentScorer {
  score(text: string): Promise<number>;
}

// VADER compound score, tuned for short informal text
export class VaderScorer implements SentimentScorer {
  async score(text: string): Promise<number> {
    return vader.SentimentIntensityAnalyzer.polarity_scores(text).compound;
  }
}

// Returns a fixed score per exact input, or the fallback
export class FixedScorer implements SentimentScorer {
  constructor(
    private scores: Record<string, number> = {},
    private fallback: number = 0
  ) {}

  async score(text: string): Promise<number> {
    return this.scores[text] ?? this.fallback;
  }
}
