const env = import.meta.env

export const appConfig = {
  storagePrefix: env.VITE_STORAGE_PREFIX ?? 'adfgvxlab',
  outputExtension: env.VITE_OUTPUT_EXTENSION ?? '.txt',
}

export const STORAGE_KEYS = {
  inputs: `${appConfig.storagePrefix}_inputs`,
}
