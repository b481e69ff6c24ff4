// file-stream-rotator ships no type declarations and has no @types package.
declare module 'file-stream-rotator' {
  import type { EventEmitter } from 'node:events';

  export interface StreamOptions {
    filename: string;
    frequency?: string;
    verbose?: boolean;
    date_format?: string;
    size?: string;
    max_logs?: string | number;
    audit_file?: string;
    end_stream?: boolean;
    file_options?: { flags?: string; encoding?: string; mode?: number };
    utc?: boolean;
    extension?: string;
    create_symlink?: boolean;
    symlink_name?: string;
  }

  export interface RotatingStream extends EventEmitter {
    write(chunk: string): boolean;
    end(): void;
  }

  const FileStreamRotator: {
    getStream(options: StreamOptions): RotatingStream;
  };
  export default FileStreamRotator;
}
