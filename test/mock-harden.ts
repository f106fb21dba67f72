// Code built for hardened JavaScript calls `harden` at module load; outside
// a locked-down realm it is an identity function.
if (!('harden' in globalThis)) {
  Object.defineProperty(globalThis, 'harden', {
    value: <Value>(value: Value): Value => value,
    configurable: true,
    writable: true,
  });
}

export {};
