export { fnv1a32, fnv1a32Hash } from './fnv1a.js'
export { murmur2, murmur2Hash } from './murmur2.js'
