export * from './schemas';

export const SERVICE_NAME = 'DePIN Compatibility API';
export const SERVICE_VERSION = '1.0.0';

export const ALL_OPERATING_SYSTEMS = 'Linux,Windows,macOS';
