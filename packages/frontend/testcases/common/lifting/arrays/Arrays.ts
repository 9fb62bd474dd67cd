class Handle { fd: int; }
class Pool { slots: Arr<3, Handle>; spare: Seq<Handle>; }
/** @operator = */
function assignHandle(dest: Var<Handle>, src: In<Handle>): void {}
/** @operator =destroy */
function closeHandle(h: Handle): void {}
function main(): void {
  let pool: Pool;
}
