export const NAME = 'switchyard';
export const VERSION = '0.4.0';
