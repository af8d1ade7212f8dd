export const KEY_MIN_LENGTH = 10;
export const KEY_MAX_LENGTH = 100;
export const KEY_MIN_VALUE = 1;
export const KEY_MAX_VALUE = 200;

export const DEFAULT_RANDOM_KEY_LENGTH = 100;

export const SCRAMBLED_SUFFIX = "_Scrambled";
export const UNSCRAMBLED_SUFFIX = "_Unscrambled";
export const REGION_RECORD_SUFFIX = "_Landmarks.txt";
export const LANDMARKS_FILE_SUFFIX = ".landmarks.json";
