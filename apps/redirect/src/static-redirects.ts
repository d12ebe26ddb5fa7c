/**
 * Built-in redirects. Highest priority in the chain: nothing in the store
 * or the redirect files can shadow these paths.
 */
export const STATIC_REDIRECTS: Readonly<Record<string, string>> = {
  "/waypost-docs": "https://example.com/waypost/docs",
  "/yaml-spec": "https://yaml.org/spec/1.2.2/",
};
