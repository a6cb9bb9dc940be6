export interface OutputSink {
  write(text: string): void;
}

export const stdoutSink: OutputSink = {
  write(text) {
    console.log(text);
  },
};
