/**
 * @consensus-harness/storage
 *
 * Block, operation and endorsement storage shared between the consensus worker and
 * its tests.
 */

export { makeStorage, type Storage } from './lib/storage';
