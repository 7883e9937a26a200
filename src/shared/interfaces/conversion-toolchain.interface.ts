export interface ConversionRun {
  exitCode: number;
  output: string;
}

/** The external converter the CAD helper runs once per request. */
export interface IConversionToolchain {
  convert(inputPath: string, outputPath: string): Promise<ConversionRun>;
}
