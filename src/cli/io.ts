import pc from 'picocolors';

/** Where the CLI writes; tests capture both streams. */
export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Colorize diagnostics. */
  color: boolean;
};

export type Palette = ReturnType<typeof pc.createColors>;

export function paletteFor(io: CliIo): Palette {
  return pc.createColors(io.color);
}

/** Real process streams, colored when the terminal supports it. */
export function processIo(): CliIo {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    color: pc.isColorSupported
  };
}
