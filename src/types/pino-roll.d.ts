declare module 'pino-roll' {
  import type { Writable } from 'stream';

  interface PinoRollOptions {
    /** Base file path; a rotation number and the extension are appended */
    file: string;
    /** Size limit for rotation (e.g., '10m', '1g') */
    size?: string;
    /** Time-based rotation: 'daily', 'hourly' or milliseconds */
    frequency?: string | number;
    /** File extension appended after the rotation number */
    extension?: string;
    /** Create the parent directory if missing */
    mkdir?: boolean;
    /** Retention of rotated files */
    limit?: {
      /** Maximum number of files to keep besides the active one */
      count?: number;
    };
  }

  export default function pinoRoll(options: PinoRollOptions): Promise<Writable>;
}
