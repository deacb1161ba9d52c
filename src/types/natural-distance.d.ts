// The Levenshtein module of natural, loaded on its own so the package barrel
// (sentiment lexicons, classifier storage) stays out of the process.
declare module 'natural/lib/natural/distance/levenshtein_distance' {
  export const LevenshteinDistance: typeof import('natural').LevenshteinDistance;
}
