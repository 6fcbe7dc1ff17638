import { parseSpecialistEndpoints } from './index';
import { SpecialistDomain } from '../agents/types';

describe('parseSpecialistEndpoints', () => {
  it('returns undefined when nothing is configured', () => {
    expect(parseSpecialistEndpoints(undefined)).toBeUndefined();
    expect(parseSpecialistEndpoints('')).toBeUndefined();
    expect(parseSpecialistEndpoints(' , ')).toBeUndefined();
  });

  it('maps URLs in consultas, cuentas, identidad, ia order', () => {
    const endpoints = parseSpecialistEndpoints(
      'http://consultas:8001, http://cuentas:8002/,http://identidad:8003,http://ia:8004'
    );

    expect(endpoints).toEqual({
      [SpecialistDomain.CONSULTAS]: 'http://consultas:8001',
      [SpecialistDomain.CUENTAS]: 'http://cuentas:8002',
      [SpecialistDomain.IDENTIDAD]: 'http://identidad:8003',
      [SpecialistDomain.IA]: 'http://ia:8004'
    });
  });

  it('rejects a list of the wrong length', () => {
    expect(() => parseSpecialistEndpoints('http://consultas:8001,http://cuentas:8002')).toThrow(
      'Expected 4 specialist endpoints (consultas, cuentas, identidad, ia), got 2'
    );
  });

  it('rejects entries that are not URLs', () => {
    expect(() => parseSpecialistEndpoints('consultas,http://b:1,http://c:1,http://d:1')).toThrow(
      'Invalid specialist endpoint: consultas'
    );
  });
});
