// Basic type declarations for vader-sentiment

declare module 'vader-sentiment' {
  export interface PolarityScores {
    neg: number;
    neu: number;
    pos: number;
    compound: number;
  }

  export interface VaderModule {
    SentimentIntensityAnalyzer: {
      polarity_scores(text: string): PolarityScores;
    };
  }

  const vader: VaderModule;
  export default vader;
}
