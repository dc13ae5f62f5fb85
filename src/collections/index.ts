/**
 * Reference collections satisfying the capability contracts.
 */

export { ArrayCollection } from './array-collection.ts';
export type { ArrayCollectionOptions } from './array-collection.ts';
export { ForwardList } from './forward-list.ts';
export type { ListNode, ForwardListIndex } from './forward-list.ts';
