export type CliOptions = {
  json?: boolean;
  debug?: boolean;
  wms?: string;
  snapshot?: string;
  /** Numeric values arrive as numbers from the argument parser. */
  user?: string | number;
  hist?: string | number;
  passThru?: string;
  global?: boolean;
  exitCodes?: boolean;
  sort?: string;
};
