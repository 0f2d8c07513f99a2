export {
  CLIReporter,
  type CLIReporterOptions,
  JSONReporter,
  type JSONReporterOptions,
  type JSONReport,
  type JSONSiteEntry,
} from './reporters'
