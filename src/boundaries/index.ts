export { parseCliOptions, parseDelimiterList } from './cli-parser';
export { loadConfig } from './config-loader';
export { parseEnvironment } from './env-parser';
export {
  formatZodIssues,
  parseSemanticChunkerOptions,
  parseSentenceChunkerOptions,
  parseTokenChunkerOptions,
  parseWordChunkerOptions,
} from './chunker-options-parser';
