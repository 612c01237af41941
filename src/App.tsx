import React, { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import {
  Alert,
  AppBar,
  Box,
  Button,
  Container,
  CssBaseline,
  Paper,
  ThemeProvider,
  Toolbar,
  Typography,
  createTheme,
} from '@mui/material';
import { Refresh } from '@mui/icons-material';
import type { SelectionState } from './types';
import config, { getYearRange } from './config';
import api from './services/api';
import { resolveDocument, findVersionRow, versionName } from './services/document';
import { DocumentFetchError, describeError } from './services/errors';
import { createListingFetcher } from './services/listing';
import {
  activeTable,
  attachDocument,
  createSelectionState,
  isEmptyListing,
  makeOptions,
  selectMake,
  selectVersion,
  selectYear,
  selectionStage,
  versionOptions,
} from './services/selection';
import SelectionSidebar from './components/SelectionSidebar';
import DocumentViewer, { type DocumentFailure } from './components/DocumentViewer';

const theme = createTheme({
  palette: {
    mode: 'light',
    primary: {
      main: '#1565C0',
      dark: '#0D47A1',
      light: '#42A5F5',
    },
    secondary: {
      main: '#666666',
      dark: '#333333',
      light: '#999999',
    },
    background: {
      default: '#F7F8FA',
      paper: '#FFFFFF',
    },
  },
  typography: {
    fontFamily: '"Inter", "Roboto", "Helvetica", "Arial", sans-serif',
  },
  shape: {
    borderRadius: 12,
  },
  components: {
    MuiSelect: {
      styleOverrides: {
        root: {
          minHeight: '48px',
        },
      },
    },
  },
});

// one listing cache per page session
const fetcher = createListingFetcher((request) => api.getListingPage(request));
const years = getYearRange();

function App() {
  const [selection, setSelection] = useState<SelectionState>(createSelectionState);
  const [loadingListing, setLoadingListing] = useState(false);
  const [loadingDocument, setLoadingDocument] = useState(false);
  const [documentFailure, setDocumentFailure] = useState<DocumentFailure | null>(null);
  const [error, setError] = useState<string | null>(null);
  const selectionRef = useRef(selection);
  const activeYearRequest = useRef(0);

  const commit = useCallback((next: SelectionState) => {
    selectionRef.current = next;
    setSelection(next);
  }, []);

  const handleYearChange = async (year: number | null) => {
    const requestId = ++activeYearRequest.current;
    setLoadingListing(year !== null && year !== selectionRef.current.year);
    setError(null);
    setDocumentFailure(null);

    try {
      const next = await selectYear(selectionRef.current, year, fetcher);
      // a newer year selection supersedes this one
      if (requestId !== activeYearRequest.current) return;
      commit(next);
      if (next.listing?.error) {
        setError(next.listing.error.message);
      }
    } catch (caught) {
      if (requestId === activeYearRequest.current) {
        setError(describeError(caught));
      }
    } finally {
      if (requestId === activeYearRequest.current) {
        setLoadingListing(false);
      }
    }
  };

  const handleMakeChange = (make: string | null) => {
    setDocumentFailure(null);
    commit(selectMake(selectionRef.current, make));
  };

  const handleVersionChange = (version: string | null) => {
    setDocumentFailure(null);
    commit(selectVersion(selectionRef.current, version));
  };

  const handleReset = () => {
    activeYearRequest.current++;
    setLoadingListing(false);
    setError(null);
    setDocumentFailure(null);
    commit(createSelectionState());
  };

  const { year, make, version, listing, document } = selection;
  const stage = selectionStage(selection);
  const makes = useMemo(() => makeOptions(selection), [listing]); // eslint-disable-line react-hooks/exhaustive-deps
  const versions = useMemo(() => versionOptions(selection), [listing, make]); // eslint-disable-line react-hooks/exhaustive-deps
  const row = make !== null && version !== null ? findVersionRow(activeTable(selection), make, version) : undefined;

  useEffect(() => {
    if (year === null || make === null || version === null || document !== null || documentFailure) {
      return;
    }
    const resolvedFor = { year, make, versionLabel: version };
    let cancelled = false;

    setLoadingDocument(true);
    void resolveDocument(activeTable(selectionRef.current), resolvedFor, api)
      .then((resolved) => {
        if (cancelled) return;
        setSelection((current) => {
          const next = attachDocument(current, resolvedFor, resolved);
          selectionRef.current = next;
          return next;
        });
      })
      .catch((caught: unknown) => {
        if (cancelled) return;
        setDocumentFailure({
          message: describeError(caught),
          status: caught instanceof DocumentFetchError ? caught.status : null,
        });
      })
      .finally(() => {
        if (!cancelled) setLoadingDocument(false);
      });

    return () => {
      cancelled = true;
      setLoadingDocument(false);
    };
  }, [year, make, version, document, documentFailure]);

  return (
    <ThemeProvider theme={theme}>
      <CssBaseline />
      <Box sx={{ display: 'flex', flexDirection: 'column', minHeight: '100vh', backgroundColor: 'background.default' }}>
        <AppBar position="sticky" elevation={1}>
          <Toolbar sx={{ minHeight: { xs: 56, sm: 64 } }}>
            <Typography
              variant="h6"
              component="div"
              sx={{ flexGrow: 1, fontSize: { xs: '1rem', sm: '1.25rem' }, fontWeight: 600, color: 'white' }}
            >
              Vehicle Documentation Viewer
            </Typography>
            <Button
              color="inherit"
              size="small"
              startIcon={<Refresh />}
              onClick={handleReset}
              sx={{ display: stage === 'no-year' ? 'none' : 'flex' }}
            >
              Reset
            </Button>
          </Toolbar>
        </AppBar>

        <Container maxWidth="xl" sx={{ py: { xs: 2, sm: 3 }, flexGrow: 1 }}>
          <Box sx={{ display: 'flex', gap: 3, flexDirection: { xs: 'column', md: 'row' } }}>
            <Paper elevation={0} sx={{ p: 2, border: '1px solid', borderColor: 'divider', width: { md: 360 }, flexShrink: 0 }}>
              <SelectionSidebar
                years={years}
                makes={makes}
                versions={versions}
                selectedYear={year}
                selectedMake={make}
                selectedVersion={version}
                loadingListing={loadingListing}
                showMakes={year !== null && !isEmptyListing(selection)}
                onYearChange={(next) => {
                  void handleYearChange(next);
                }}
                onMakeChange={handleMakeChange}
                onVersionChange={handleVersionChange}
              />
            </Paper>

            <Box sx={{ flex: 1 }}>
              {error && (
                <Alert severity="error" sx={{ mb: 2 }} onClose={() => setError(null)}>
                  {error}
                </Alert>
              )}

              {isEmptyListing(selection) && !loadingListing && !listing?.error && (
                <Alert severity="info" sx={{ mb: 2 }}>
                  No defect letters were found for {year}.
                </Alert>
              )}

              {year !== null && make !== null && version !== null ? (
                <DocumentViewer
                  year={year}
                  make={make}
                  name={versionName(version)}
                  url={row?.url ?? null}
                  document={document}
                  loading={loadingDocument}
                  failure={documentFailure}
                  height={config.pdfViewerHeight}
                />
              ) : (
                <Alert severity="info">
                  Please select a year, make, and version from the sidebar to view documentation.
                </Alert>
              )}
            </Box>
          </Box>
        </Container>
      </Box>
    </ThemeProvider>
  );
}

export default App;
