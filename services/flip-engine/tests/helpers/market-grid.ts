import type { RawCell } from "../../src/data/market-loader.js";

export interface MarketRowFixture {
  region?: RawCell;
  locality: RawCell;
  price: {
    overall: RawCell;
    t1?: RawCell;
    t2?: RawCell;
    t3?: RawCell;
    house?: RawCell;
  };
  absorption?: {
    overall?: RawCell;
    t1?: RawCell;
    t2?: RawCell;
    t3?: RawCell;
    house?: RawCell;
  };
}

export const HEADER_ROW: RawCell[] = [
  "Regiao", "Localidade", null,
  "Fogos Total", "Fogos T1", "Fogos T2", "Fogos T3", "Fogos Moradia",
  "EUR/m2 Total", "EUR/m2 T1", "EUR/m2 T2", "EUR/m2 T3", "EUR/m2 Moradia",
  "EUR/Fogo Total", null, null, null, null,
  "Absorcao Total", "Absorcao T1", "Absorcao T2", "Absorcao T3", "Absorcao Moradia",
];

// One 23-column sheet row in the reference layout
export function marketRow(fixture: MarketRowFixture): RawCell[] {
  const absorption = fixture.absorption ?? {};
  return [
    fixture.region ?? null, fixture.locality, null,
    null, null, null, null, null,
    fixture.price.overall, fixture.price.t1 ?? null, fixture.price.t2 ?? null, fixture.price.t3 ?? null, fixture.price.house ?? null,
    null, null, null, null, null,
    absorption.overall ?? null, absorption.t1 ?? null, absorption.t2 ?? null, absorption.t3 ?? null, absorption.house ?? null,
  ];
}

export function marketGrid(...rows: MarketRowFixture[]): RawCell[][] {
  return [HEADER_ROW, ...rows.map(marketRow)];
}

export const LISBOA: MarketRowFixture = {
  region: "Grande Lisboa",
  locality: "Lisboa",
  price: { overall: 5200, t1: 5600, t2: 5100, t3: 4800, house: 6100 },
  absorption: { overall: 5.5, t1: 4, t2: 5, t3: 7, house: 9 },
};

export const PORTO: MarketRowFixture = {
  region: "Norte",
  locality: "Porto",
  price: { overall: 3400, t1: 3700, t3: 3300 },
  absorption: { overall: 6, t2: 5.5 },
};

export const EVORA: MarketRowFixture = {
  region: "Alentejo",
  locality: "Évora",
  price: { overall: 1800 },
};
