// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import Page from '../src/app/page';
import { item, json, reportResponse } from './fixtures';

const articles = [item('Good chips','positive'), item('Bad storm','negative'), item('Plain update','neutral')];

let reportStatus = 200;

beforeEach(() => {
  reportStatus = 200;
  vi.stubGlobal('fetch', vi.fn(async (url:string) => {
    if(url.endsWith('/health')) return json({ ok:true, providers:{ newsapi:false, llm:true } });
    return reportStatus === 200
      ? json(reportResponse(articles, ['rss: BBC News: timeout']))
      : json({ ok:false, error:'openai: API key not configured' }, reportStatus);
  }));
});

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
});

describe('Page', () => {
  it('shows backend status on load', async () => {
    render(<Page />);
    expect(await screen.findByText('· NewsAPI off (RSS only) · LLM on')).toBeTruthy();
    expect(screen.getByText('Pick topics or trending news and run a report.')).toBeTruthy();
  });

  it('runs a report and filters the cards by sentiment', async () => {
    render(<Page />);

    fireEvent.click(screen.getByRole('button', { name:'Run report' }));

    expect(await screen.findByText('Good chips')).toBeTruthy();
    expect(screen.getAllByRole('article')).toHaveLength(3);
    expect(screen.getByText('rss: BBC News: timeout')).toBeTruthy();

    fireEvent.change(screen.getByLabelText('Sentiment filter'), { target:{ value:'negative' } });

    const titles = screen.getAllByRole('article').map(a=>a.querySelector('h3')?.textContent);
    expect(titles).toEqual(['Bad storm']);
    expect(screen.getByTestId('stat-total').textContent).toBe('3Total');
  });

  it('shows the error from a failed run', async () => {
    reportStatus = 400;
    render(<Page />);

    fireEvent.click(screen.getByRole('button', { name:'Run report' }));

    expect((await screen.findByRole('alert')).textContent).toBe('Error: openai: API key not configured');
  });
});
