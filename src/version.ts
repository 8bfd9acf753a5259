export const NAME = 'stepwise';
export const VERSION = '0.3.0';
