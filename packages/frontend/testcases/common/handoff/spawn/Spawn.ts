class Handle { fd: int; }
class Job { input: Handle; retries: int; }
class Message { body: Seq<char>; next: Ptr<Message>; }
/** @operator =deepCopy */
function dupHandle(h: Ref<Handle>): Ref<Handle> {
  return h;
}
declare function runJob(job: Job): void;
declare function deliver(m: Message, attempts: int): void;
function main(job: Job, m: Message): void {
  spawn(runJob, job);
  spawn(deliver, m, 3);
}
