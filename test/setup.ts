// Loaded before every test file: keep the logger quiet and off the filesystem.
process.env.LOG_LEVEL = 'fatal';
process.env.LOG_FILE = 'false';

export {};
