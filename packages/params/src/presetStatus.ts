/** Set to true once the active preset has been read by the main params module */
export const presetStatus = {
  frozen: false,
};
