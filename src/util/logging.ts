let verbose = false;

export const setVerbose = (enabled: boolean): void => {
  verbose = enabled;
};

export const logger = {
  debug(message: string): void {
    if (verbose) {
      console.debug(message);
    }
  },
  info(message: string): void {
    console.info(message);
  },
  warn(message: string): void {
    console.warn(message);
  },
  error(message: string): void {
    console.error(message);
  }
};
