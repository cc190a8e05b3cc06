export * from "./lib/header/ip/options";
export { IPV4Address } from "./lib/address/ipv4";
