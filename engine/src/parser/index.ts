export {
  PowerShellConfigurationParser,
  parseConfiguration,
  parseParserOutput,
  formatModuleList,
  BUILT_IN_DSC_MODULE,
  type ConfigurationParser,
} from "./configuration-parser";
export { buildParseConfigurationScript } from "./parse-script";
