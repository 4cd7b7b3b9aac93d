// lunar-javascript ships no type declarations; only the Solar members used here.
declare module "lunar-javascript" {
  export class Solar {
    static fromYmdHms(year: number, month: number, day: number, hour: number, minute: number, second: number): Solar;
    static fromJulianDay(julianDay: number): Solar;
    getJulianDay(): number;
    getYear(): number;
    getMonth(): number;
    getDay(): number;
  }
}
