export function publicAssetUrl(params: {
  publicBaseUrl: string | null | undefined;
  key: string | null | undefined;
}): string | null {
  const base = (params.publicBaseUrl ?? '').trim().replace(/\/+$/, '');
  const key = (params.key ?? '').trim().replace(/^\/+/, '');
  if (!base || !key) return null;
  return `${base}/${key}`;
}
