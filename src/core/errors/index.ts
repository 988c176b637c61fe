// src/core/errors/index.ts

export type { Classified, ClassificationKind, ErrorGuard, IdentityMatcher, TypedUnwrapper } from './classified';
export { isClassified, unwrap, unwrapAll } from './classified';
export { Sentinel, newSentinel } from './Sentinel';
export { Carrier, isCarrier, classify, wrap } from './Carrier';
export { matches, findAs } from './identity';
export { Displayable, newDisplayable, isDisplayable, displayText, displayTextDefault } from './Displayable';
export type { Attr, AttrList } from './Attributed';
export {
    Attributed,
    isAttributed,
    BAD_KEY,
    attr,
    attrs,
    parseAttrs,
    fromAttrMap,
    formatAttrs,
    attrsToLogContext,
    hasAttrs,
    extractAttrs,
} from './Attributed';
export { VisitedErrors, visitClassifications } from './graphTraversal';
