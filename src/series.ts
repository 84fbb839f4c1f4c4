/**
 * Forecast series published in the Riksbank Monetary Policy Report
 *
 * Identifiers follow the API's naming: SE + frequency (Q/M/A) + concept +
 * transformation. Use MonetaryPolicyDataService.listSeries() for the
 * authoritative, current list.
 */

export const SERIES = {
    gdp: { id: 'SEQGDPNAYCA', description: 'GDP, calendar-adjusted annual percentage change' },
    gdpSeasonallyAdjusted: { id: 'SEQGDPNAYSA', description: 'GDP, seasonally adjusted annual percentage change' },
    gdpNotAdjusted: { id: 'SEQGDPNAYNA', description: 'GDP, annual percentage change, not adjusted' },
    gdpLevelSaca: { id: 'SEQGDPNAASA', description: 'GDP level, seasonally and calendar adjusted, SEK million' },
    gdpLevelCa: { id: 'SEQGDPNAACA', description: 'GDP level, calendar adjusted, SEK million' },
    gdpLevelNa: { id: 'SEQGDPNAANA', description: 'GDP level, not adjusted, SEK million' },
    gdpGap: { id: 'SEQGDPGAPYSA', description: 'GDP gap, percent of potential GDP' },
    unemployment: { id: 'SEQLABUEASA', description: 'Unemployment rate (LFS), seasonally adjusted, percent of labour force' },
    employedPersons: { id: 'SEQLABEPASA', description: 'Employed persons (LFS), seasonally adjusted, thousands' },
    labourForce: { id: 'SEQLABLFASA', description: 'Labour force (LFS), seasonally adjusted, thousands' },
    cpi: { id: 'SEMCPINAYNA', description: 'CPI, annual percentage change' },
    cpiIndex: { id: 'SEMCPINAANA', description: 'CPI, index level' },
    cpif: { id: 'SEMCPIFNAYNA', description: 'CPIF, annual percentage change' },
    cpifExEnergy: { id: 'SEMCPIFFEXYNA', description: 'CPIF excluding energy, annual percentage change' },
    cpifExEnergyIndex: { id: 'SEMCPIFFEXANA', description: 'CPIF excluding energy, index level' },
    hourlyLabourCost: { id: 'SEACOMNAYCA', description: 'Hourly labour cost (national accounts), annual percentage change' },
    hourlyWageNationalAccounts: { id: 'SEAWAGNAYCA', description: 'Hourly wage (national accounts), annual percentage change' },
    hourlyWageShortTermStatistics: { id: 'SEAWAGKLYNA', description: 'Hourly wage (short-term wage statistics), annual percentage change' },
    population: { id: 'SEPOPYRCA', description: 'Population aged 15-74, annual percentage change' },
    populationLevel: { id: 'SEQPOPNAANA', description: 'Population aged 15-74, thousands' },
    policyRate: { id: 'SEQRATENAYNA', description: 'Policy rate, quarterly average, percent' },
    kix: { id: 'SEQKIXNAANA', description: 'Nominal exchange rate, KIX index' },
    governmentNetLending: { id: 'SEAPBSNAYNA', description: 'General government net lending, percent of GDP' }
} as const;

export type SeriesName = keyof typeof SERIES;
