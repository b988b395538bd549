// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type XtId = Brand<number, "XtId">;
export type ClientId = Brand<string, "ClientId">;

export const MAX_UINT32 = 0xffff_ffff;

export const isUint32 = (n: number): boolean =>
  Number.isInteger(n) && n >= 0 && n <= MAX_UINT32;

export const asXtId = (n: number): XtId => {
  if (!isUint32(n)) throw new RangeError(`xt_id out of uint32 range: ${n}`);
  return n as XtId;
};
export const asClientId = (s: string): ClientId => s as ClientId;
