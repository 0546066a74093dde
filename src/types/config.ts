export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'verbose' | 'debug';
}

export interface MatchingConfig {
  strict_color_codes: boolean;
}

export interface LimitsConfig {
  max_input_bytes: number;
}

export interface OutputConfig {
  media_type: string;
  pretty: boolean;
}

export interface DecoderConfig {
  logging: LoggingConfig;
  matching: MatchingConfig;
  limits: LimitsConfig;
  output: OutputConfig;
}
