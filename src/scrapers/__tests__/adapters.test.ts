import { describe, expect, it } from 'vitest';
import type { SiteConfig } from '../../types/index.js';
import { GenericAnchorAdapter } from '../adapters/generic-anchors.js';
import { TableRowAdapter } from '../adapters/table-rows.js';

const anchorSite: SiteConfig = {
    name: 'School A',
    listingUrl: 'https://school-a.example/news/list',
    originUrl: 'https://school-a.example/',
    adapter: 'anchors'
};

const tableSite: SiteConfig = {
    name: 'School B',
    listingUrl: 'https://school-b.example/bulletin/index.php',
    originUrl: 'https://school-b.example/bulletin/',
    adapter: 'table'
};

const RESPONSIVE_LISTING = `
<html><body>
  <div class="nav"><a href="/">首頁</a><a href="/more">更多</a></div>
  <ul class="list">
    <li><div class="row"><span class="date">2025-05-01</span><div class="title"><a href="/news/1">羽球場地借用公告</a></div></div></li>
    <li><div class="row"><span class="date">2025-04-20</span><div class="title"><a href="news/2">校慶活動籌備會議</a></div></div></li>
    <li><div class="row"><span class="date">2025-04-18</span><div class="title"><a href="/news/1">羽球場地借用公告(手機版)</a></div></div></li>
    <li><div class="row"><span class="date">2025-04-10</span><div class="title"><a href="/news/3">羽球</a></div></div></li>
  </ul>
  <div class="pager"><a href="javascript:void(0)">下一頁</a><a href="#">下一頁</a><a href="/news/list?page=2">下一頁</a></div>
</body></html>`;

describe('GenericAnchorAdapter', () => {
    it('pairs anchors with the nearest ancestor date and dedupes by url', () => {
        const result = new GenericAnchorAdapter().parse(RESPONSIVE_LISTING, anchorSite);
        expect(result.candidates).toEqual([
            { site: 'School A', rawDate: '2025-05-01', title: '羽球場地借用公告', url: 'https://school-a.example/news/1' },
            { site: 'School A', rawDate: '2025-04-20', title: '校慶活動籌備會議', url: 'https://school-a.example/news/2' }
        ]);
    });

    it('takes the first real next-page link', () => {
        const result = new GenericAnchorAdapter().parse(RESPONSIVE_LISTING, anchorSite);
        expect(result.nextPageUrl).toBe('https://school-a.example/news/list?page=2');
    });

    it('ignores a next-page link back to the listing', () => {
        const html = '<div><a href="/news/list">下一頁</a></div>';
        expect(new GenericAnchorAdapter().parse(html, anchorSite).nextPageUrl).toBeNull();
    });

    it('has no next page without a labelled link', () => {
        const html = '<div><span>2025-05-01</span><a href="/news/9">羽球場週末開放</a></div>';
        expect(new GenericAnchorAdapter().parse(html, anchorSite).nextPageUrl).toBeNull();
    });

    it('respects the walk depth', () => {
        const html = '<div><span>2025-05-01</span><div><div><div><a href="/x">羽球場地開放說明</a></div></div></div></div>';
        expect(new GenericAnchorAdapter().parse(html, anchorSite).candidates).toEqual([]);
        expect(new GenericAnchorAdapter({ maxDepth: 4 }).parse(html, anchorSite).candidates).toEqual([
            { site: 'School A', rawDate: '2025-05-01', title: '羽球場地開放說明', url: 'https://school-a.example/x' }
        ]);
    });

    it('uses a configured date pattern and label', () => {
        const html = `
          <p><span>114/05/01</span><a href="/n/7">羽毛球場地整修通知</a></p>
          <p><a href="/list?p=2">Next</a></p>`;
        const adapter = new GenericAnchorAdapter({ datePattern: /\d{3}\/\d{2}\/\d{2}/, nextPageLabel: 'Next' });
        const result = adapter.parse(html, anchorSite);
        expect(result.candidates).toEqual([
            { site: 'School A', rawDate: '114/05/01', title: '羽毛球場地整修通知', url: 'https://school-a.example/n/7' }
        ]);
        expect(result.nextPageUrl).toBe('https://school-a.example/list?p=2');
    });

    it('collapses whitespace in titles', () => {
        const html = '<div><span>2025-05-01</span><a href="/n/8">\n  羽球場\n  開放時間調整  </a></div>';
        expect(new GenericAnchorAdapter().parse(html, anchorSite).candidates[0]?.title).toBe('羽球場 開放時間調整');
    });
});

const TABLE_LISTING = `
<table>
  <tr><th>日期</th><th>標題</th></tr>
  <tr><td>114/05/01</td><td><a href="show.php?id=10">羽球場週末開放公告</a></td></tr>
  <tr><td>114/04/02</td><td><a href="#">展開</a><a href="show.php?id=11">家長會議通知</a></td></tr>
  <tr><td>114/03/02</td><td><a href="show.php?id=12">停課</a></td></tr>
  <tr><td>無日期</td><td><a href="show.php?id=13">羽球社團招生簡章</a></td></tr>
  <tr><td>114/02/02</td><td>沒有連結的公告</td></tr>
  <tr><td>2025-01-15</td><td><a href="show.php?id=10">羽球場週末開放公告</a></td></tr>
</table>`;

describe('TableRowAdapter', () => {
    it('emits one candidate per row with a date and a titled link', () => {
        const result = new TableRowAdapter().parse(TABLE_LISTING, tableSite);
        expect(result.candidates).toEqual([
            { site: 'School B', rawDate: '114/05/01', title: '羽球場週末開放公告', url: 'https://school-b.example/bulletin/show.php?id=10' },
            { site: 'School B', rawDate: '114/04/02', title: '家長會議通知', url: 'https://school-b.example/bulletin/show.php?id=11' }
        ]);
        expect(result.nextPageUrl).toBeNull();
    });

    it('titles a row from the first link long enough to be a title', () => {
        const html = `
          <table>
            <tr><td>114/05/01</td><td><a href="/cat/3">公告</a></td><td><a href="/n/1">羽球場週末開放公告</a></td></tr>
          </table>`;
        expect(new TableRowAdapter().parse(html, tableSite).candidates).toEqual([
            { site: 'School B', rawDate: '114/05/01', title: '羽球場週末開放公告', url: 'https://school-b.example/n/1' }
        ]);
    });

    it('only extracts dates whose separators match', () => {
        const html = `
          <table>
            <tr><td>2025/05-01</td><td><a href="show.php?id=30">羽球場週末開放公告</a></td></tr>
            <tr><td>2025/05/02</td><td><a href="show.php?id=31">羽球場夜間開放公告</a></td></tr>
          </table>`;
        expect(new TableRowAdapter().parse(html, tableSite).candidates).toEqual([
            { site: 'School B', rawDate: '2025/05/02', title: '羽球場夜間開放公告', url: 'https://school-b.example/bulletin/show.php?id=31' }
        ]);
    });

    it('skips layout rows that wrap other rows', () => {
        const html = `
          <table><tr><td>
            <a href="/home">回到學校首頁</a> 2025-01-01
            <table><tr><td>2025-05-01</td><td><a href="/n/1">羽球場地公告</a></td></tr></table>
          </td></tr></table>`;
        expect(new TableRowAdapter().parse(html, tableSite).candidates).toEqual([
            { site: 'School B', rawDate: '2025-05-01', title: '羽球場地公告', url: 'https://school-b.example/n/1' }
        ]);
    });

    it('reads list rows and next page when configured', () => {
        const html = `
          <ul>
            <li>2025-05-03 <a href="show.php?id=20">羽球校隊甄選</a></li>
          </ul>
          <a href="index.php?page=2">下一頁</a>`;
        const result = new TableRowAdapter({ rowSelector: 'li', nextPageLabel: '下一頁' }).parse(html, tableSite);
        expect(result.candidates).toEqual([
            { site: 'School B', rawDate: '2025-05-03', title: '羽球校隊甄選', url: 'https://school-b.example/bulletin/show.php?id=20' }
        ]);
        expect(result.nextPageUrl).toBe('https://school-b.example/bulletin/index.php?page=2');
    });
});
