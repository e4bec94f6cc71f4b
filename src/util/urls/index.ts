// Fetching, cleaning and resolving URLs.
//
// HTTP redirects are followed by the transport; `<meta http-equiv="refresh">`
// redirects are found by classifying the destination and followed by the
// resolver. Redirects driven by JavaScript are not detected.

export * from './fetcher.js';
export * from './clean-params.js';
export * from './url-resolver.js';
