// Basic type declarations for jstat

declare module 'jstat' {
  export interface jStat {
    normal: {
      cdf(x: number, mean: number, std: number): number;
      inv(p: number, mean: number, std: number): number;
    };

    mean(data: number[]): number;
    median(data: number[]): number;
  }

  const jStat: jStat;
  export default jStat;
}
