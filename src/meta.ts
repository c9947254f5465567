/**
 * Remote object handles. Nvim sends them as msgpack ext values whose payload
 * is the integer handle; buffer and window ids are global, not per tabpage.
 */
export class NvimBuffer {
  constructor(public readonly id: number) {
  }
}

export class NvimWindow {
  constructor(public readonly id: number) {
  }
}

export class NvimTabpage {
  constructor(public readonly id: number) {
  }
}

export interface ExtTypeConstructor<T> {
  new (id: number): T
}

export interface MetadataType {
  constructor: ExtTypeConstructor<NvimBuffer | NvimTabpage | NvimWindow>
  // type name nvim uses in its api metadata
  name: 'Buffer' | 'Window' | 'Tabpage'
}

// index in this list is the msgpack ext type
export const Metadata: readonly MetadataType[] = [
  {
    constructor: NvimBuffer,
    name: 'Buffer'
  },
  {
    constructor: NvimWindow,
    name: 'Window'
  },
  {
    constructor: NvimTabpage,
    name: 'Tabpage'
  },
]
