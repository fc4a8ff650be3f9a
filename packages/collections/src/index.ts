export { Collections, setCompanion } from "./collections.js";
export type { MapCompanion, SetCompanion } from "./collections.js";
export { SortedCollections } from "./sorted-collections.js";

export { EquaBox, SortedEquaBox } from "./equa-box.js";
export type { PathTag } from "./equa-box.js";

export { EquaSetBase } from "./equa-set.js";
export type { EquaSet } from "./equa-set.js";
export { FastEquaSet } from "./fast-equa-set.js";
export { TreeEquaSet } from "./tree-equa-set.js";
export type { SortedEquaSet } from "./tree-equa-set.js";

export { EquaMap } from "./equa-map.js";
export { EquaBridge } from "./equa-bridge.js";
export { partialFunction } from "./partial-function.js";
export type { PartialFunction } from "./partial-function.js";

export { EquaSetView } from "./views/equa-set-view.js";
export { FastEquaSetView } from "./views/fast-equa-set-view.js";
export { TreeEquaSetView } from "./views/tree-equa-set-view.js";
export type { ViewNode } from "./views/view-node.js";
