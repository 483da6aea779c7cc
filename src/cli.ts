#!/usr/bin/env node
/**
 * resale-price – ask a running pricing server for a price.
 *
 *   resale-price --brand Nike --model "Air Force 1 Low" --size 10 --condition very-good
 *   resale-price --barcode 0885909950805
 *   resale-price --image https://example.com/photo.jpg --notes "light creasing"
 *   resale-price --brand Sony --model "WH-1000XM4" --category electronics --prospect --asking 60
 *
 * PRICING_URL overrides the server (default http://localhost:3000).
 */

import { parseArgs } from 'node:util';
import { request } from 'undici';

export interface CliRequest {
  path: '/api/price' | '/api/prospect' | '/api/analyze';
  body: Record<string, unknown>;
}

export function buildCliRequest(args: string[]): CliRequest {
  const { values } = parseArgs({
    args,
    options: {
      brand: { type: 'string' },
      model: { type: 'string' },
      name: { type: 'string' },
      size: { type: 'string' },
      category: { type: 'string' },
      condition: { type: 'string' },
      notes: { type: 'string' },
      barcode: { type: 'string' },
      image: { type: 'string', multiple: true },
      text: { type: 'string', multiple: true },
      prospect: { type: 'boolean' },
      asking: { type: 'string' },
    },
    strict: true,
  });

  const images = values.image ?? [];
  if (images.length > 0 || values.barcode) {
    return {
      path: '/api/analyze',
      body: {
        images,
        barcode: values.barcode,
        texts: values.text ?? [],
        categoryHint: values.category,
        conditionNotes: values.notes,
      },
    };
  }

  if (!values.brand && !values.model && !values.name) {
    throw new Error('Pass --brand/--model/--name, --barcode or at least one --image');
  }

  let askingPrice: number | undefined;
  if (values.asking !== undefined) {
    askingPrice = Number(values.asking);
    if (!Number.isFinite(askingPrice) || askingPrice <= 0) {
      throw new Error(`--asking must be a positive price, got "${values.asking}"`);
    }
  }

  return {
    path: values.prospect || askingPrice !== undefined ? '/api/prospect' : '/api/price',
    body: {
      ...(askingPrice !== undefined ? { askingPrice } : {}),
      identification: {
        productName: values.name ?? [values.brand, values.model].filter(Boolean).join(' '),
        brand: values.brand ?? '',
        productLine: values.model ?? '',
        size: values.size ?? '',
        category: values.category ?? 'other',
        // the caller vouches for what they typed
        confidence: 1,
      },
      condition: values.condition ? { grade: values.condition } : { narrative: values.notes ?? 'Good' },
    },
  };
}

export async function main(args: string[] = process.argv.slice(2)): Promise<unknown> {
  const baseUrl = process.env.PRICING_URL || 'http://localhost:3000';
  const { path, body } = buildCliRequest(args);
  const r = await request(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  const j = await r.body.json();
  console.log(JSON.stringify(j, null, 2));
  if (r.statusCode >= 400) {
    process.exitCode = 1;
  }
  return j;
}

if (require.main === module) {
  main().catch((e) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
