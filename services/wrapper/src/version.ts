export const NAME = 'v2v-wrapper'
export const VERSION = '0.1.0'
