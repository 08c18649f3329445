export type BuildDescriptor =
  | { readonly kind: 'compose'; readonly file: string }
  | { readonly kind: 'dockerfile'; readonly file: string }

export interface WorkingCopy {
  readonly dir: string
  readonly branch: string
  readonly descriptor: BuildDescriptor
}
