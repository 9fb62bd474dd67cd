class Handle { fd: int; }
declare function openHandle(): Handle;
/** @operator =destroy */
function closeHandle(h: Handle): void {}
function main(done: bool): void {
  const a = openHandle();
  const b = openHandle();
  if (done) {
    return;
  }
  const c = openHandle();
}
