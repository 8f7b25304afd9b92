// Config bootstrap reports through console.info and console.error; keep those
// quiet in test output unless LOG_LEVEL asks for them. The pino logger has its
// own silent level under vitest.
const logLevel = process.env.LOG_LEVEL?.toLowerCase()

const shownByLevel: Record<string, ReadonlyArray<'info' | 'error'>> = {
  debug: ['info', 'error'],
  info: ['info', 'error'],
  warn: ['error'],
  error: ['error'],
}

const shown: ReadonlyArray<'info' | 'error'> = (logLevel ? shownByLevel[logLevel] : undefined) ?? []

if (!shown.includes('info')) console.info = () => {}
if (!shown.includes('error')) console.error = () => {}
