// Dependency injection types
export type ExitFn = (code: number) => never

export type Env = Record<string, string | undefined>

export interface FsModule {
	readFile(path: string, encoding: 'utf-8'): Promise<string>
}

export interface OutputStream {
	write(chunk: string): unknown
}
