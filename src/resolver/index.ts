export {
  defaultRouteTable,
  identifyPublisher,
  MANUAL_ROUTE,
  type Publisher,
  PUBLISHER_NAMES,
  PUBLISHER_PREFIXES,
  type RouteTable,
  type RouteTableOpts,
} from "./publishers.js";
export { mergeRouteTables, SourceResolver } from "./resolver.js";
