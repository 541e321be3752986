import { load } from 'cheerio';
import { describe, it, expect } from 'vitest';
import {
  formatBirthDate,
  normalizeSeason,
  parsePlayerBio,
  parsePlayerHistory,
  parsePlayerList
} from '../../src/parsers/playerPages.js';

const galleryHtml = `
<div class="player-gallery">
  <a class="player" href="https://league.test/player/dana-levi/"><img src="d.jpg"> Dana Levi <span>Harbor City</span></a>
  <a class="player" href="https://league.test/player/omer-dahan/">Omer Dahan<span>Ridge Town B.C.</span></a>
  <a class="player">No Link<span>Ridge Town B.C.</span></a>
</div>
<a class="player" href="https://league.test/player/elsewhere/">Outside Gallery<span>Lakeside</span></a>
`;

const playerHtml = `
<div class="player-data">
  <div class="data-birthdate"><span class="label">תאריך לידה</span> 1999-04-23 </div>
  <div class="data-other" data-metric="משקל"><span class="label">משקל</span>72</div>
  <div class="data-other" data-metric="גובה"><span class="label">גובה</span>1.78</div>
  <ul class="general">
    <li><span class="label">עמדה</span><span class="data-position">גארד</span></li>
    <li><span class="label">מספר חולצה</span><span class="data-number">7</span></li>
  </ul>
  <div class="data-teams">
    <span class="label">קבוצות</span>
    <br><span title="עונה">2024-2025</span> <a href="#">Harbor City</a> <a href="#">ליגה לאומית</a>
    <br><span title="עונה">2024-2025</span> <a href="#">Lakeside</a> <a href="#">ליגת העל</a>
    <br><span title="עונה">2023-2024</span> <a href="#">Harbor City</a> <a href="#">ליגה לאומית</a>
    <br><span title="עונה">2017-2018</span> <a href="#">Harbor City</a> <a href="#">ליגת נוער על</a>
    <br><span title="עונה">2016-2017</span> <a href="#">Harbor City</a> <a href="#">ליגת נוער ארצית</a>
    <br><span title="עונה">2015-2016</span> <a href="#">Harbor City</a> <a href="#">ליגת נערים</a>
  </div>
</div>
`;

describe('playerPages', () => {
  describe('parsePlayerList', () => {
    it('should read name, team and link of every gallery entry', () => {
      expect(parsePlayerList(load(galleryHtml))).toEqual([
        { name: 'Dana Levi', team: 'Harbor City', url: 'https://league.test/player/dana-levi/' },
        { name: 'Omer Dahan', team: 'Ridge Town B.C.', url: 'https://league.test/player/omer-dahan/' }
      ]);
    });
  });

  describe('formatBirthDate', () => {
    it('should reorder ISO dates to day/month/year', () => {
      expect(formatBirthDate('1999-04-23')).toBe('23/04/1999');
      expect(formatBirthDate('')).toBe('');
    });
  });

  describe('normalizeSeason', () => {
    it('should shorten the second year', () => {
      expect(normalizeSeason('2024-2025')).toBe('2024-25');
      expect(normalizeSeason('2024')).toBe('2024');
    });
  });

  describe('parsePlayerBio', () => {
    it('should read date of birth, height and number', () => {
      expect(parsePlayerBio(load(playerHtml))).toEqual({ dateOfBirth: '23/04/1999', height: '1.78', number: '7' });
    });

    it('should leave missing fields empty', () => {
      expect(parsePlayerBio(load('<div class="player-data"></div>'))).toEqual({ dateOfBirth: '', height: '', number: '' });
    });
  });

  describe('parsePlayerHistory', () => {
    it('should join same-season entries and stop at the second youth entry', () => {
      expect(parsePlayerHistory(load(playerHtml))).toEqual({
        '2024-25': 'Harbor City (ליגה לאומית), Lakeside (ליגת העל)',
        '2023-24': 'Harbor City (ליגה לאומית)',
        '2017-18': 'Harbor City (ליגת נוער על)'
      });
    });

    it('should return an empty history without a teams block', () => {
      expect(parsePlayerHistory(load('<div></div>'))).toEqual({});
    });
  });
});
