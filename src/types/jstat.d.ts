// Type declarations for the parts of jstat this library calls

declare module 'jstat' {
  export interface jStat {
    normal: {
      cdf(x: number, mean: number, std: number): number;
    };

    mean(data: number[]): number;
  }

  const jStat: jStat;
  export default jStat;
}
