const VERSION = '1.0.0';

export function getVersion(): string {
  return VERSION;
}
