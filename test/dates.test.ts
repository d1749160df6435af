import {
  addDays,
  dateRange,
  firstDayOfMonth,
  formatClock,
  isLocalDate,
  lastDayOfMonth,
  parseLocalDate,
  toLocalDate,
} from '../src/dates'

describe('dates', () => {
  test('toLocalDate and formatClock read local time', () => {
    const ts = new Date(2024, 0, 5, 7, 3, 59).getTime()

    expect(toLocalDate(ts)).toBe('2024-01-05')
    expect(formatClock(ts)).toBe('07:03')
  })

  test('parseLocalDate rejects impossible dates', () => {
    expect(parseLocalDate('2024-02-29')?.getDate()).toBe(29)
    expect(parseLocalDate('2023-02-29')).toBeNull()
    expect(isLocalDate('2024-1-5')).toBe(false)
    expect(isLocalDate('2024-13-01')).toBe(false)
  })

  test('addDays crosses month and year boundaries', () => {
    expect(addDays('2024-01-31', 1)).toBe('2024-02-01')
    expect(addDays('2024-01-01', -1)).toBe('2023-12-31')
    expect(addDays('2024-03-10', 7)).toBe('2024-03-17')
  })

  test('dateRange is inclusive and empty when reversed', () => {
    expect(dateRange('2024-02-27', '2024-03-01')).toEqual(['2024-02-27', '2024-02-28', '2024-02-29', '2024-03-01'])
    expect(dateRange('2024-03-01', '2024-02-27')).toEqual([])
  })

  test('month bounds', () => {
    expect(firstDayOfMonth(2024, 2)).toBe('2024-02-01')
    expect(lastDayOfMonth(2024, 2)).toBe('2024-02-29')
    expect(lastDayOfMonth(2023, 12)).toBe('2023-12-31')
  })
})
