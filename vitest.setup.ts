// Tests start with debug logging off; individual tests opt in.
delete process.env.HISTOKIT_DEBUG;
Reflect.deleteProperty(globalThis, '__HISTOKIT_DEBUG');
