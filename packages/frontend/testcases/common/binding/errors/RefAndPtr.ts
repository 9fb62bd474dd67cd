class Handle { fd: int; }
/** @operator =deepCopy */
function dupRef(h: Ref<Handle>): Ref<Handle> {
  return h;
}
/** @operator =deepCopy */
function dupPtr(h: Ptr<Handle>): Ptr<Handle> {
  return h;
}
