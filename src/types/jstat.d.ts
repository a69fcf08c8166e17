// Type declarations for the parts of jstat this project uses.
// jstat ships no types and has no @types package.

declare module 'jstat' {
  export interface JStatStatic {
    sum(data: number[]): number;
    mean(data: number[]): number;
    min(data: number[]): number;
    max(data: number[]): number;
    /** Population variance by default, sample variance when `flag` is true */
    variance(data: number[], flag?: boolean): number;
    /** Population standard deviation by default, sample when `flag` is true */
    stdev(data: number[], flag?: boolean): number;
  }

  const jStat: JStatStatic;
  export default jStat;
}
