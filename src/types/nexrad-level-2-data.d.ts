// nexrad-level-2-data ships no type declarations.
declare module 'nexrad-level-2-data' {
  export class Level2Radar {
    constructor(data: Buffer, options?: { logger?: false | object });
    header: {
      icao?: string;
      ICAO?: string;
      date?: number | string;
      time?: number | string;
    };
    /** Message 5 (or 7) of the volume: the VCP the radar ran */
    vcp?: VcpMessage;
    /** Raw message 31 records per elevation index */
    data?: Record<number, Message31[] | undefined>;
    listElevations(): number[];
    setElevation(elevationNumber: number): void;
    getHighresReflectivity(): HighResData | null;
    getHighresVelocity(): HighResData | null;
  }

  interface VcpMessage {
    message_type?: number;
    record?: {
      pattern_number?: number;
      num_elevations?: number;
      elevations?: { elevation_angle?: number }[];
    };
  }

  interface Message31 {
    record?: {
      elevation_angle?: number;
      elevation_number?: number;
      /** Collection date, modified Julian (day 1 = 1970-01-01) */
      julian_date?: number;
      /** Collection time, ms past midnight UTC */
      mseconds?: number;
    };
  }

  interface HighResData {
    gate_count: number;
    first_gate: number;
    gate_size: number;
    azimuth: number[];
    data: number[][];
  }
}
