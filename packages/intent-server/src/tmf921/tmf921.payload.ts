import { z } from 'zod';
import type { Intent } from '../intents/intent.types';

const DEFAULT_DELIVERY_EXPECTATIONS = [
  {
    target: '_:service',
    params: { targetDescription: 'cat:EventWirelessAccess' },
  },
];

const expectationSchema = z.object({ target: z.string(), params: z.record(z.string(), z.unknown()) }).passthrough();
const serviceAreaSchema = z.array(z.object({ longitude: z.number(), latitude: z.number() }));
const validForSchema = z.object({ startDateTime: z.string(), endDateTime: z.string() }).passthrough();

export type Tmf921IntentPayload = {
  name: string;
  description: string;
  '@type': 'Intent';
  externalId: string;
  deliveryExpectations: Array<Record<string, unknown>>;
  propertyExpectations?: Array<Record<string, unknown>>;
  validFor?: Record<string, unknown>;
  expression?: Record<string, unknown>;
  characteristic?: Array<{ name: string; value: unknown }>;
};

function eventLiveBroadcastExpression(): Record<string, unknown> {
  return {
    context: {
      icm: 'http://www.models.tmforum.org/tio/v1.0/IntentCommonModel#',
      cat: 'http://www.operator.com/Catalog#',
      idan: 'http://www.idan-tmforum-catalyst.org/IntentDrivenAutonomousNetworks#',
      geo: 'https://tmforum.org/2020/07/geographicPoint#',
    },
    idan: {
      EventLiveBroadcast: {
        '@type': 'icm:Intent',
        'icm:intentOwner': 'idan:ABCEvents',
        'icm:hasExpectation': [],
      },
    },
  };
}

/** Builds the downstream create body from a local intent. */
export function buildIntentPayload(intent: Intent): Tmf921IntentPayload {
  const spec = intent.specification;
  const payload: Tmf921IntentPayload = {
    name: intent.name,
    description: intent.description,
    '@type': 'Intent',
    externalId: intent.id,
    deliveryExpectations: DEFAULT_DELIVERY_EXPECTATIONS.map((e) => ({ ...e, params: { ...e.params } })),
  };

  // Keys consumed into a dedicated TMF921 field; anything else (or malformed) stays a characteristic.
  const consumed = new Set<string>();

  const delivery = z.array(expectationSchema).min(1).safeParse(spec.deliveryExpectations);
  if (delivery.success) {
    payload.deliveryExpectations = delivery.data;
    consumed.add('deliveryExpectations');
  }

  const properties = z.array(expectationSchema).safeParse(spec.propertyExpectations);
  if (properties.success) {
    if (properties.data.length > 0) payload.propertyExpectations = properties.data;
    consumed.add('propertyExpectations');
  }

  const validFor = validForSchema.safeParse(spec.validFor);
  if (validFor.success) {
    payload.validFor = validFor.data;
    consumed.add('validFor');
  }

  if (spec.intentType === 'EventLiveBroadcast') {
    payload.expression = eventLiveBroadcastExpression();
    consumed.add('intentType');
  }

  const area = serviceAreaSchema.safeParse(spec.serviceArea);
  if (area.success) {
    const points = area.data.map((p) => ({ 'geo:longitude': p.longitude, 'geo:latitude': p.latitude }));
    if (points.length > 0) {
      payload.propertyExpectations = [
        ...(payload.propertyExpectations ?? []),
        { target: '_:service', params: { 'elb:areaOfService': points } },
      ];
    }
    consumed.add('serviceArea');
  }

  const characteristic = Object.entries(spec)
    .filter(([key]) => !consumed.has(key))
    .map(([name, value]) => ({ name, value }));
  if (characteristic.length > 0) payload.characteristic = characteristic;

  return payload;
}
