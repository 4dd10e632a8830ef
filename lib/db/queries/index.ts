export * from "./users";
export * from "./swap-requests";
