import path from 'node:path';
import fs from 'node:fs';
import FileStreamRotator from 'file-stream-rotator';
import type { RotatingStream } from 'file-stream-rotator';

/** JSON-lines diagnostics file, rotated daily. */
export class FileSink {
  private stream: RotatingStream | null;
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    // the rotator does not always create the directory itself
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.stream = createRotatingStream(filePath);
  }

  write(line: string) {
    this.stream?.write(line);
  }

  close() {
    this.stream?.end();
    this.stream = null;
  }
}

function createRotatingStream(targetPath: string): RotatingStream {
  // The configured name becomes a symlink to the active dated file.
  const dir = path.dirname(targetPath);
  const symlinkName = path.basename(targetPath).replace(/-%DATE%/g, '');

  return FileStreamRotator.getStream({
    filename: targetPath,
    frequency: 'daily',
    date_format: 'YYYY-MM-DD',
    create_symlink: true,
    symlink_name: symlinkName,
    audit_file: path.join(dir, '.audit.json'),
  });
}
