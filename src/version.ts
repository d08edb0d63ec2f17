export const NAME = 'decision-copilot';
export const VERSION = '0.1.0';
